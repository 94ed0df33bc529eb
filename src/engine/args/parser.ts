/**
 * parser - 引数解析パイプライン
 *
 *   argv → Tokenizer → OptionMatcher（オペランドは保留）→ 割り当て
 *        → 位置順のイベント列 → 畳み込み
 *
 * 最初のエラーで中断し、途中までの設定は呼び出し側に見せない。
 *
 * 使用例:
 *   const outcome = parseSettings(tailSpec, tailSettings, ['-n', '20', 'file']);
 *   if (outcome.kind === 'settings') console.log(outcome.settings.number);
 */

import { ARGS_CONFIG } from '@/constants/config';

import { argsError, argsInfo, argsWarn } from './argsLogger';
import { ArgError } from './errors';
import type { ArgEvent, OptionEvent, ParseRequest } from './events';
import { OptionMatcher } from './matcher';
import { allocate, greedyStart, selectLayout } from './positional';
import type { TrailingCapture } from './positional';
import { fold } from './reducer';
import type { Env, SettingsDef } from './reducer';
import type { ArgSpec } from './spec';
import { Tokenizer } from './tokenizer';
import type { RawArg, Token } from './tokenizer';

export interface ParseOptions {
  /** 初期値と POSIXLY_CORRECT の参照先。省略時は process.env */
  env?: Env;
  /** トークン・イベントをログストアに記録する */
  trace?: boolean;
}

export type ParseOutcome =
  | { kind: 'args'; events: ArgEvent[]; trailing: readonly string[] | null }
  | ParseRequest;

export type SettingsOutcome<S> =
  | { kind: 'settings'; settings: S; trailing: readonly string[] | null }
  | ParseRequest;

export type Result<T> = { ok: true; value: T } | { ok: false; error: ArgError };

function describeEvent(event: ArgEvent): string {
  switch (event.kind) {
    case 'option':
      return `option ${event.id} (${event.flag}) = ${event.value ?? '<none>'}`;
    case 'operand':
      return `operand ${event.id} = ${event.value}`;
    case 'trailing':
      return `trailing ${event.id} = [${event.values.join(', ')}]`;
  }
}

function scan(spec: ArgSpec, argv: readonly string[], env: Env, trace: boolean): ParseOutcome {
  const permute = spec.permute && env.POSIXLY_CORRECT === undefined;
  const tokens = new Tokenizer(argv, spec);
  const matcher = new OptionMatcher(spec, tokens);
  const start = greedyStart(spec.operands);

  const options: OptionEvent[] = [];
  const free: RawArg[] = [];
  let trailing: TrailingCapture | null = null;
  let operandsOnly = false;

  for (;;) {
    let token: Token | null;
    if (operandsOnly) {
      const raw = tokens.takeRaw();
      token = raw === null ? null : { kind: 'value', value: raw.value, position: raw.position };
    } else {
      token = tokens.next();
    }
    if (token === null) break;
    if (trace) argsInfo('token', token.kind, token.position);

    if (token.kind === 'terminator') continue;

    if (token.kind === 'value') {
      if (start !== null && free.length >= start) {
        // ここから先はすべて greedy スロットのもの
        trailing = { values: [token.value, ...tokens.rest()], position: token.position };
        break;
      }
      free.push({ value: token.value, position: token.position });
      if (!permute) operandsOnly = true;
      continue;
    }

    if (trace && token.kind === 'numeric') {
      argsWarn(`deprecated shorthand '${token.raw}' rewritten to option ${token.binding.target}`);
    }

    const result = matcher.match(token);
    options.push(...result.events);
    if (result.request) {
      if (trace) argsInfo('request', result.request.kind, result.request.flag);
      return result.request;
    }
  }

  const slots = selectLayout(spec, options);
  const operands = allocate(free, slots, trailing);

  // 元の引数の順に並べる（同じ位置のイベントは出力順のまま）
  const events: ArgEvent[] = [...options, ...operands].sort((a, b) => a.position - b.position);
  if (trace) events.forEach(e => argsInfo(describeEvent(e)));

  return { kind: 'args', events, trailing: trailing?.values ?? null };
}

/**
 * 引数列をイベント列に変換する。失敗時は ArgError を投げる
 */
export function parseArgs(
  spec: ArgSpec,
  argv: readonly string[],
  options: ParseOptions = {}
): ParseOutcome {
  const env = options.env ?? process.env;
  const trace = options.trace ?? ARGS_CONFIG.TRACE;

  try {
    return scan(spec, argv, env, trace);
  } catch (e) {
    if (trace && e instanceof ArgError) argsError(`${e.kind}: ${e.message}`);
    throw e;
  }
}

/**
 * 引数列を解析して設定レコードを作る。
 * 畳み込みはイベント列が完成してから新しいレコードに対して行う。
 */
export function parseSettings<S>(
  spec: ArgSpec,
  def: SettingsDef<S>,
  argv: readonly string[],
  options: ParseOptions = {}
): SettingsOutcome<S> {
  const outcome = parseArgs(spec, argv, options);
  if (outcome.kind !== 'args') return outcome;

  const env = options.env ?? process.env;
  const settings = fold(def.initial(env), outcome.events, def.apply);
  return { kind: 'settings', settings, trailing: outcome.trailing };
}

function attempt<T>(run: () => T): Result<T> {
  try {
    return { ok: true, value: run() };
  } catch (e) {
    if (e instanceof ArgError) return { ok: false, error: e };
    throw e;
  }
}

export function tryParseArgs(
  spec: ArgSpec,
  argv: readonly string[],
  options: ParseOptions = {}
): Result<ParseOutcome> {
  return attempt(() => parseArgs(spec, argv, options));
}

export function tryParseSettings<S>(
  spec: ArgSpec,
  def: SettingsDef<S>,
  argv: readonly string[],
  options: ParseOptions = {}
): Result<SettingsOutcome<S>> {
  return attempt(() => parseSettings(spec, def, argv, options));
}
