/**
 * values - イベント値の型変換
 *
 * 変換に失敗した場合は InvalidValueError（オプション識別子と生テキスト付き）を投げる。
 */

import { InvalidValueError } from './errors';
import type { OptionEvent } from './events';

export type IntegerKind =
  | 'u8'
  | 'u16'
  | 'u32'
  | 'u64'
  | 'u128'
  | 'i8'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'i128';

function bounds(kind: IntegerKind): [bigint, bigint] {
  const bits = BigInt(kind.slice(1));
  if (kind.startsWith('u')) return [0n, 2n ** bits - 1n];
  return [-(2n ** (bits - 1n)), 2n ** (bits - 1n) - 1n];
}

const SIGNED = /^[+-]?\d+$/;
const UNSIGNED = /^\+?\d+$/;

/**
 * 整数として解釈する。符号なしの種類では '-' を受け付けない
 */
export function toBigInt(option: string, raw: string, kind: IntegerKind = 'i64'): bigint {
  const pattern = kind.startsWith('u') ? UNSIGNED : SIGNED;
  if (!pattern.test(raw)) throw new InvalidValueError(option, raw, 'invalid number');

  const n = BigInt(raw.startsWith('+') ? raw.slice(1) : raw);
  const [min, max] = bounds(kind);
  if (n > max) throw new InvalidValueError(option, raw, 'value too large');
  if (n < min) throw new InvalidValueError(option, raw, 'value too small');
  return n;
}

/**
 * number に収まる整数として解釈する
 */
export function toInteger(option: string, raw: string, kind: IntegerKind = 'u32'): number {
  const n = toBigInt(option, raw, kind);
  if (n > BigInt(Number.MAX_SAFE_INTEGER) || n < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new InvalidValueError(option, raw, 'value too large');
  }
  return Number(n);
}

const DECIMAL = /^(\d+(?:\.\d*)?|\.\d+)$/;

/**
 * 0 以上の小数として解釈する (`--sleep-interval=0.5`)
 */
export function toNumber(option: string, raw: string): number {
  if (!DECIMAL.test(raw)) throw new InvalidValueError(option, raw, 'invalid number');
  return Number(raw);
}

/**
 * 列挙メンバーへ絞り込む。値はマッチャーで解決済みなので、ここでは型の確認のみ
 */
export function toEnum<T extends string>(option: string, raw: string, members: readonly T[]): T {
  const member = members.find(m => m === raw);
  if (member === undefined) throw new InvalidValueError(option, raw);
  return member;
}

/**
 * 値を持つはずのイベントから値を取り出す
 */
export function requireValue(event: OptionEvent): string {
  if (event.value === null) throw new InvalidValueError(event.id, '', 'a value is required');
  return event.value;
}
