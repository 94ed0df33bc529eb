/**
 * tokenizer - 引数列の字句解析
 *
 * 生の引数列を一度だけ前から読み、Token を一つずつ返す。
 * 必須値の取り込み（takeRaw）や残り全体の取り込み（rest）のため、
 * 呼び出し側は同じカーソルから次の引数をそのまま受け取ることもできる。
 * 巻き戻しはできない。読み直す場合は作り直す。
 */

import type { ArgSpec, DeprecatedNumeric, NumericMatch, NumericSign } from './spec';

export type Token =
  | { kind: 'short'; chars: string; raw: string; position: number }
  | { kind: 'long'; name: string; value: string | null; raw: string; position: number }
  | { kind: 'value'; value: string; position: number }
  | { kind: 'terminator'; position: number }
  | {
      kind: 'numeric';
      match: NumericMatch;
      binding: DeprecatedNumeric;
      raw: string;
      position: number;
    };

export interface RawArg {
  value: string;
  position: number;
}

const isDigit = (c: string | undefined) => c !== undefined && c >= '0' && c <= '9';

/**
 * `-20` `+20` `-100cf` のような旧式の数値省略形に一致するバインディングを探す
 */
export function matchNumeric(
  arg: string,
  position: number,
  bindings: readonly DeprecatedNumeric[]
): { match: NumericMatch; binding: DeprecatedNumeric } | null {
  const sign: NumericSign | null = arg[0] === '+' ? '+' : arg[0] === '-' ? '-' : null;
  if (sign === null) return null;

  let end = 1;
  while (isDigit(arg[end])) end++;
  if (end === 1) return null;

  const digits = arg.slice(1, end);
  const suffix = arg.slice(end);

  for (const binding of bindings) {
    if (binding.sign !== sign) continue;
    if (binding.firstOnly && position !== 0) continue;

    const used = new Set<string>();
    const fits = [...suffix].every(c => {
      if (!binding.suffix.includes(c) || used.has(c)) return false;
      used.add(c);
      return true;
    });
    if (fits) return { match: { sign, digits, suffix }, binding };
  }
  return null;
}

export class Tokenizer {
  private readonly args: readonly string[];
  private readonly spec: ArgSpec;
  private index = 0;
  private terminated = false;

  constructor(args: readonly string[], spec: ArgSpec) {
    this.args = args;
    this.spec = spec;
  }

  /** 次に読む引数の位置 */
  get position(): number {
    return this.index;
  }

  next(): Token | null {
    if (this.index >= this.args.length) return null;

    const position = this.index++;
    const arg = this.args[position];

    if (this.terminated) return { kind: 'value', value: arg, position };

    if (arg === '--') {
      this.terminated = true;
      return { kind: 'terminator', position };
    }

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      return eq === -1
        ? { kind: 'long', name: body, value: null, raw: arg, position }
        : { kind: 'long', name: body.slice(0, eq), value: body.slice(eq + 1), raw: arg, position };
    }

    if (arg.startsWith('-') && arg.length > 1) {
      if (!isDigit(arg[1])) return { kind: 'short', chars: arg.slice(1), raw: arg, position };
      return this.classifyDashDigit(arg, position);
    }

    if (arg.startsWith('+')) {
      const numeric = matchNumeric(arg, position, this.spec.numeric);
      if (numeric) return { kind: 'numeric', ...numeric, raw: arg, position };
    }

    return { kind: 'value', value: arg, position };
  }

  /**
   * 数字で始まる `-N...` は、短いオプションとして宣言されていればクラスタ、
   * 旧式のバインディングに一致すれば数値省略形、どちらでもなければ値
   */
  private classifyDashDigit(arg: string, position: number): Token {
    const declared = this.spec.shortTable.has(arg[1]);
    const numeric = matchNumeric(arg, position, this.spec.numeric);

    if (declared && (this.spec.numericPrecedence === 'short' || !numeric)) {
      return { kind: 'short', chars: arg.slice(1), raw: arg, position };
    }
    if (numeric) return { kind: 'numeric', ...numeric, raw: arg, position };
    return { kind: 'value', value: arg, position };
  }

  /**
   * 次の引数を解釈せずにそのまま取り出す（必須値用）
   */
  takeRaw(): RawArg | null {
    if (this.index >= this.args.length) return null;
    const position = this.index++;
    return { value: this.args[position], position };
  }

  /**
   * 残りの引数をすべてそのまま取り出す
   */
  rest(): string[] {
    const remaining = this.args.slice(this.index);
    this.index = this.args.length;
    return remaining;
  }

  *[Symbol.iterator](): Generator<Token> {
    let token = this.next();
    while (token !== null) {
      yield token;
      token = this.next();
    }
  }
}
