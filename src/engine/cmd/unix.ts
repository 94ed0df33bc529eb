// Unixコマンドの引数定義をまとめて提供する

import {
  B2sumCommand,
  CommCommand,
  CpCommand,
  LsCommand,
  MktempCommand,
  TailCommand,
  TimeoutCommand,
} from './unixOperations';

import { visibleOptions } from '@/engine/args';
import type {
  ArgSpec,
  CompletionShell,
  OptionSpec,
  ParseOptions,
  Result,
  SettingsOutcome,
} from '@/engine/args';

/**
 * 名前で引いた時に使える操作（設定の型を問わない）
 */
export interface RegisteredCommand {
  readonly name: string;
  readonly argSpec: ArgSpec;
  tryParse(args: readonly string[], options?: ParseOptions): Result<SettingsOutcome<unknown>>;
  completion(shell: CompletionShell): string;
}

/**
 * Unixコマンドを統合して提供するクラス
 *
 * - 各コマンドの定義は unixOperations/ 配下に分割
 * - 型付きの設定が必要な場合は個別のプロパティ (unix.tail など) を使う
 * - 名前で引く場合は設定の型は unknown になる
 */
export class UnixCommands {
  readonly b2sum = new B2sumCommand();
  readonly comm = new CommCommand();
  readonly cp = new CpCommand();
  readonly ls = new LsCommand();
  readonly mktemp = new MktempCommand();
  readonly tail = new TailCommand();
  readonly timeout = new TimeoutCommand();

  private get registry(): ReadonlyMap<string, RegisteredCommand> {
    const commands: RegisteredCommand[] = [
      this.b2sum,
      this.comm,
      this.cp,
      this.ls,
      this.mktemp,
      this.tail,
      this.timeout,
    ];
    return new Map(commands.map((cmd): [string, RegisteredCommand] => [cmd.name, cmd]));
  }

  names(): string[] {
    return [...this.registry.keys()].sort();
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  private command(name: string): RegisteredCommand {
    const cmd = this.registry.get(name);
    if (!cmd) throw new Error(`${name}: command not found`);
    return cmd;
  }

  tryParse(
    name: string,
    args: readonly string[],
    options: ParseOptions = {}
  ): Result<SettingsOutcome<unknown>> {
    return this.command(name).tryParse(args, options);
  }

  completion(name: string, shell: CompletionShell): string {
    return this.command(name).completion(shell);
  }

  /**
   * --help の表示用。隠しスペリングと組み込みの --help / --version は除く
   */
  options(name: string): OptionSpec[] {
    return visibleOptions(this.command(name).argSpec);
  }
}
