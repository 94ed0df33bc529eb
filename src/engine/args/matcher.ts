/**
 * matcher - オプションの照合
 *
 * Tokenizer が返したオプション系のトークンを OptionSpec に結び付け、
 * スペリングごとのアリティに従って値を取り込み、イベントを作る。
 * 競合チェックは行わない。同じオプションが何度現れてもすべて出力し、
 * 勝敗は畳み込み側の「後勝ち」で決まる。
 */

import {
  AmbiguousOptionError,
  AmbiguousValueError,
  InvalidValueError,
  MissingValueError,
  UnexpectedValueError,
  UnknownOptionError,
} from './errors';
import type { OptionEvent, ParseRequest } from './events';
import { resolvePrefix } from './prefix';
import type { ArgSpec, OptionSpec, SpellingRef } from './spec';
import type { Token, Tokenizer } from './tokenizer';

export type OptionToken = Extract<Token, { kind: 'short' | 'long' | 'numeric' }>;

export interface MatchResult {
  events: OptionEvent[];
  /** --help などが見つかった場合。以降の解析は行わない */
  request: ParseRequest | null;
}

/**
 * 列挙値を前方一致で解決する。
 * 候補が複数でもすべて同じメンバーを指すなら曖昧とはしない。
 */
export function resolveValue(option: OptionSpec, flag: string, raw: string): string {
  if (option.values === null) return raw;

  const resolution = resolvePrefix(raw, option.values.map(v => v.key));
  const memberOf = (key: string) => option.values?.find(v => v.key === key)?.member ?? key;

  switch (resolution.kind) {
    case 'exact':
    case 'prefix':
      return memberOf(resolution.name);
    case 'ambiguous': {
      const members = new Set(resolution.candidates.map(memberOf));
      if (members.size === 1) return memberOf(resolution.candidates[0]);
      throw new AmbiguousValueError(flag, raw, resolution.candidates);
    }
    case 'none':
      throw new InvalidValueError(flag, raw);
  }
}

export class OptionMatcher {
  private readonly spec: ArgSpec;
  private readonly tokens: Tokenizer;

  constructor(spec: ArgSpec, tokens: Tokenizer) {
    this.spec = spec;
    this.tokens = tokens;
  }

  match(token: OptionToken): MatchResult {
    switch (token.kind) {
      case 'short':
        return this.matchShort(token.chars, token.position);
      case 'long':
        return this.matchLong(token.name, token.value, token.raw, token.position);
      case 'numeric':
        return {
          events: [
            {
              kind: 'option',
              id: token.binding.target,
              flag: token.raw,
              value: token.binding.transform(token.match),
              position: token.position,
            },
          ],
          request: null,
        };
    }
  }

  /**
   * 短いオプションのクラスタを左から処理する。
   * 値を取る文字に当たったら、残りの文字がその値になる。
   */
  private matchShort(chars: string, position: number): MatchResult {
    const events: OptionEvent[] = [];

    for (let i = 0; i < chars.length; i++) {
      const c = chars[i];
      const ref = this.spec.shortTable.get(c);
      if (!ref) throw new UnknownOptionError(`-${c}`, 'short');

      const { option, spelling } = ref;
      if (option.builtin !== null) {
        return { events, request: { kind: option.builtin, flag: spelling.flag, position } };
      }

      const remainder = chars.slice(i + 1);

      switch (spelling.arity) {
        case 'none':
          events.push(this.event(ref, this.fallback(ref), position));
          continue;

        case 'required': {
          let value = remainder;
          if (value === '') {
            const next = this.tokens.takeRaw();
            if (next === null) throw new MissingValueError(spelling.flag);
            value = next.value;
          }
          events.push(this.event(ref, resolveValue(option, spelling.flag, value), position));
          return { events, request: null };
        }

        case 'optional':
          // 任意値は次の引数を消費しない
          events.push(
            this.event(
              ref,
              remainder === '' ? this.fallback(ref) : resolveValue(option, spelling.flag, remainder),
              position
            )
          );
          return { events, request: null };
      }
    }

    return { events, request: null };
  }

  private matchLong(
    name: string,
    inline: string | null,
    raw: string,
    position: number
  ): MatchResult {
    if (name === '') throw new UnknownOptionError(raw);

    const resolution = resolvePrefix(name, this.spec.longNames);
    if (resolution.kind === 'none') throw new UnknownOptionError(raw);
    if (resolution.kind === 'ambiguous') {
      throw new AmbiguousOptionError(
        `--${name}`,
        resolution.candidates.map(c => `--${c}`)
      );
    }

    const ref = this.spec.longTable.get(resolution.name);
    if (!ref) throw new UnknownOptionError(raw);
    const { option, spelling } = ref;

    if (spelling.arity === 'none' && inline !== null) {
      throw new UnexpectedValueError(spelling.flag, inline);
    }

    if (option.builtin !== null) {
      return { events: [], request: { kind: option.builtin, flag: spelling.flag, position } };
    }

    let value: string | null = null;
    switch (spelling.arity) {
      case 'none':
        value = this.fallback(ref);
        break;
      case 'required': {
        let text = inline;
        if (text === null) {
          const next = this.tokens.takeRaw();
          if (next === null) throw new MissingValueError(spelling.flag);
          text = next.value;
        }
        value = resolveValue(option, spelling.flag, text);
        break;
      }
      case 'optional':
        // 任意値は = で連結された場合のみ。後続の引数はオペランドとして残す
        value = inline === null ? this.fallback(ref) : resolveValue(option, spelling.flag, inline);
        break;
    }

    return { events: [this.event(ref, value, position)], request: null };
  }

  private fallback({ option, spelling }: SpellingRef): string | null {
    return spelling.default ?? option.default;
  }

  private event({ option, spelling }: SpellingRef, value: string | null, position: number): OptionEvent {
    return { kind: 'option', id: option.id, flag: spelling.flag, value, position };
  }
}
