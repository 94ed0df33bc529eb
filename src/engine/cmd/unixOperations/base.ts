import {
  parseSettings,
  renderCompletion,
  tryParseSettings,
} from '@/engine/args';
import type {
  ArgEvent,
  ArgSpec,
  CompletionShell,
  Env,
  ParseOptions,
  Result,
  SettingsDef,
  SettingsOutcome,
} from '@/engine/args';

/**
 * Unixコマンドのベースクラス
 * 引数定義と設定レコードへの畳み込みをまとめて持つ
 *
 * - spec: モジュールごとに一度だけ作る不変の定義（解析間で共有）
 * - initial: 解析ごとに新しい設定レコードを作る
 * - apply: イベント一つ分の変更。どのイベントがどのフィールドを書くかはここに集約する
 */
export abstract class UnixCommandBase<S> {
  abstract readonly name: string;
  protected abstract readonly spec: ArgSpec;

  protected abstract initial(env: Env): S;
  protected abstract apply(settings: S, event: ArgEvent): S;

  get argSpec(): ArgSpec {
    return this.spec;
  }

  protected get settingsDef(): SettingsDef<S> {
    return {
      initial: env => this.initial(env),
      apply: (settings, event) => this.apply(settings, event),
    };
  }

  /**
   * 引数を解析する。失敗時は ArgError を投げる
   */
  parse(args: readonly string[], options: ParseOptions = {}): SettingsOutcome<S> {
    return parseSettings(this.spec, this.settingsDef, args, options);
  }

  tryParse(args: readonly string[], options: ParseOptions = {}): Result<SettingsOutcome<S>> {
    return tryParseSettings(this.spec, this.settingsDef, args, options);
  }

  completion(shell: CompletionShell): string {
    return renderCompletion(this.name, this.spec, shell);
  }
}
