/**
 * 引数解析エラー
 *
 * すべて致命的エラーで、最初に発生したものだけが呼び出し側に返る。
 * メッセージは GNU coreutils の文言に合わせている。
 */

export type ArgErrorKind =
  | 'UnknownOption'
  | 'AmbiguousOption'
  | 'AmbiguousValue'
  | 'MissingRequiredValue'
  | 'UnexpectedValue'
  | 'InvalidValue'
  | 'MissingOperand'
  | 'ExcessOperand';

/**
 * 解析エラーの基底クラス
 */
export abstract class ArgError extends Error {
  abstract readonly kind: ArgErrorKind;
  /** 問題になった生テキスト（オプション名、値、オペランド） */
  readonly text: string;

  constructor(message: string, text: string) {
    super(message);
    this.name = 'ArgError';
    this.text = text;
  }
}

function quoteList(items: readonly string[]): string {
  return items.map(s => `'${s}'`).join(' ');
}

/**
 * 宣言されていないオプション
 * 短いオプションの場合 text は `-x`、長いオプションの場合は入力されたままの `--name`
 */
export class UnknownOptionError extends ArgError {
  readonly kind = 'UnknownOption';

  /** クラスタ内の `-` (`-a-`) は `--` と同じ綴りになるため form で区別する */
  constructor(
    option: string,
    form: 'short' | 'long' = option.startsWith('--') ? 'long' : 'short'
  ) {
    super(
      form === 'long' ? `unrecognized option '${option}'` : `invalid option -- '${option.slice(1)}'`,
      option
    );
  }
}

export class AmbiguousOptionError extends ArgError {
  readonly kind = 'AmbiguousOption';
  readonly candidates: readonly string[];

  constructor(option: string, candidates: readonly string[]) {
    super(`option '${option}' is ambiguous; possibilities: ${quoteList(candidates)}`, option);
    this.candidates = candidates;
  }
}

export class AmbiguousValueError extends ArgError {
  readonly kind = 'AmbiguousValue';
  readonly option: string;
  readonly candidates: readonly string[];

  constructor(option: string, value: string, candidates: readonly string[]) {
    super(
      `ambiguous argument '${value}' for '${option}'\nValid arguments are: ${quoteList(candidates)}`,
      value
    );
    this.option = option;
    this.candidates = candidates;
  }
}

export class MissingValueError extends ArgError {
  readonly kind = 'MissingRequiredValue';

  constructor(option: string) {
    super(
      option.startsWith('--')
        ? `option '${option}' requires an argument`
        : `option requires an argument -- '${option.slice(1)}'`,
      option
    );
  }
}

export class UnexpectedValueError extends ArgError {
  readonly kind = 'UnexpectedValue';
  readonly value: string;

  constructor(option: string, value: string) {
    super(`option '${option}' doesn't allow an argument`, option);
    this.value = value;
  }
}

/**
 * 値の型変換、または列挙値の解決（一致なし）に失敗した
 */
export class InvalidValueError extends ArgError {
  readonly kind = 'InvalidValue';
  /** オプションの識別子（位置引数ならスロット名） */
  readonly option: string;
  readonly reason: string | null;

  constructor(option: string, value: string, reason: string | null = null) {
    super(`invalid argument '${value}' for '${option}'${reason ? `: ${reason}` : ''}`, value);
    this.option = option;
    this.reason = reason;
  }
}

export class MissingOperandError extends ArgError {
  readonly kind = 'MissingOperand';
  /** 最小数に届かなかったスロット（宣言順） */
  readonly slots: readonly string[];

  constructor(slots: readonly string[], after: string | null) {
    super(after === null ? 'missing operand' : `missing operand after '${after}'`, slots[0] ?? '');
    this.slots = slots;
  }
}

export class ExcessOperandError extends ArgError {
  readonly kind = 'ExcessOperand';

  constructor(operand: string) {
    super(`extra operand '${operand}'`, operand);
  }
}

/**
 * 引数定義そのものが不正（定義時に検出）
 */
export class ArgSpecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgSpecError';
  }
}
