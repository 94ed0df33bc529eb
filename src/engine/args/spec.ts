/**
 * spec - 引数定義モデル
 *
 * ユーティリティが受け付けるオプション・オペランド・旧式の数値省略形を
 * 不変のテーブルとして保持する。構築時にすべての構造チェックを行い、
 * 解析中は読み取り専用で共有される。
 *
 * フラグ表記:
 *   '-v'              値なし
 *   '-n NUM' '-nNUM'  必須値
 *   '-p[DIR]'         任意値（クラスタの残りからのみ受け取る）
 *   '--lines=NUM'     必須値
 *   '--tmpdir[=DIR]'  任意値（= で連結した場合のみ受け取る）
 *   '---presume-input-pipe'  隠しスペリング（先頭の余分な - は名前の一部）
 */

import { ARGS_CONFIG } from '@/constants/config';

import { ArgSpecError } from './errors';

export type ValueArity = 'none' | 'required' | 'optional';

/**
 * 一つのスペリング（`-p` や `--tmpdir`）
 */
export interface Spelling {
  readonly kind: 'short' | 'long';
  /** '-' を除いた名前。隠しスペリングは先頭に '-' が残る */
  readonly name: string;
  /** 表示用の表記 (`-p`, `--tmpdir`) */
  readonly flag: string;
  readonly arity: ValueArity;
  readonly valueName: string | null;
  readonly hidden: boolean;
  /** 値なし・任意値で値が与えられなかった時に使う値 */
  readonly default: string | null;
  readonly help: string | null;
}

/**
 * 列挙値テーブルの一行。複数のキーが同じメンバーを指すことがある
 */
export interface ValueKey {
  readonly key: string;
  readonly member: string;
}

/**
 * 値の種類。補完でファイルやユーザー名を候補にするために使う
 */
export type ValueHint =
  | 'any-path'
  | 'file-path'
  | 'dir-path'
  | 'executable-path'
  | 'username'
  | 'hostname';

export interface OptionSpec {
  readonly id: string;
  readonly spellings: readonly Spelling[];
  readonly values: readonly ValueKey[] | null;
  readonly hint: ValueHint | null;
  readonly default: string | null;
  readonly help: string | null;
  readonly builtin: 'help' | 'version' | null;
}

export type Arity =
  | { readonly kind: 'exactly'; readonly n: number }
  | { readonly kind: 'range'; readonly min: number; readonly max: number }
  | { readonly kind: 'atLeast'; readonly n: number };

export const exactly = (n: number): Arity => ({ kind: 'exactly', n });
export const range = (min: number, max: number): Arity => ({ kind: 'range', min, max });
export const atLeast = (n: number): Arity => ({ kind: 'atLeast', n });

export function arityMin(arity: Arity): number {
  return arity.kind === 'range' ? arity.min : arity.n;
}

export function arityMax(arity: Arity): number {
  switch (arity.kind) {
    case 'exactly':
      return arity.n;
    case 'range':
      return arity.max;
    case 'atLeast':
      return Infinity;
  }
}

export interface PositionalSlot {
  readonly id: string;
  readonly arity: Arity;
  /** ここから先の入力をすべてそのまま取り込み、オプション解析を止める */
  readonly greedy: boolean;
  readonly help: string | null;
}

export interface OperandLayout {
  /** このオプションが現れた時に使うレイアウト */
  readonly when: string;
  readonly slots: readonly PositionalSlot[];
}

export type NumericSign = '+' | '-';

export interface NumericMatch {
  readonly sign: NumericSign;
  readonly digits: string;
  readonly suffix: string;
}

export interface DeprecatedNumeric {
  readonly sign: NumericSign;
  /** 書き換え先のオプション id */
  readonly target: string;
  /** 数字の後に続いてよい文字 */
  readonly suffix: string;
  /** 最初の引数の位置でのみ認識する */
  readonly firstOnly: boolean;
  readonly transform: (match: NumericMatch) => string;
}

export type NumericPrecedence = 'short' | 'numeric';

export interface SpellingRef {
  readonly option: OptionSpec;
  readonly spelling: Spelling;
}

export interface ArgSpec {
  readonly options: readonly OptionSpec[];
  readonly shortTable: ReadonlyMap<string, SpellingRef>;
  readonly longTable: ReadonlyMap<string, SpellingRef>;
  /** 宣言順の長いオプション名（前方一致の候補） */
  readonly longNames: readonly string[];
  readonly operands: readonly PositionalSlot[];
  readonly operandLayouts: readonly OperandLayout[];
  readonly numeric: readonly DeprecatedNumeric[];
  readonly numericPrecedence: NumericPrecedence;
  readonly permute: boolean;
}

// ==================== 定義（入力） ====================

export interface FlagDef {
  flag: string;
  default?: string;
  hidden?: boolean;
  help?: string;
}

export type ValuesDef = readonly string[] | Readonly<Record<string, readonly string[]>>;

export interface OptionDef {
  id: string;
  /** 空の場合は数値省略形の書き換え先としてのみ使える */
  flags: readonly (string | FlagDef)[];
  values?: ValuesDef;
  /** 値を取るスペリングがある場合のみ。values とは併用できない */
  hint?: ValueHint;
  default?: string;
  hidden?: boolean;
  help?: string;
}

export interface SlotDef {
  id: string;
  /** 省略時は exactly(1) */
  arity?: Arity;
  greedy?: boolean;
  help?: string;
}

export interface NumericDef {
  sign: NumericSign;
  target: string;
  suffix?: string;
  firstOnly?: boolean;
  transform?: (match: NumericMatch) => string;
}

export interface ArgSpecDef {
  options?: readonly OptionDef[];
  operands?: readonly SlotDef[];
  operandLayouts?: readonly { when: string; operands: readonly SlotDef[] }[];
  numeric?: readonly NumericDef[];
  numericPrecedence?: NumericPrecedence;
  permute?: boolean;
  /** false で --help を無効化 */
  help?: readonly string[] | false;
  version?: readonly string[] | false;
}

// ==================== フラグ表記のパース ====================

const LONG_FLAG = /^--(-?[A-Za-z0-9][A-Za-z0-9_.-]*)(?:=([^\s[\]=]+)|\[=([^\s[\]=]+)\])?$/;
const SHORT_FLAG = /^-([^\s\-[\]=])(?:\s*([^\s[\]]+)|\[([^\s[\]]+)\])?$/;

interface ParsedFlag {
  kind: 'short' | 'long';
  name: string;
  arity: ValueArity;
  valueName: string | null;
}

/**
 * フラグ表記を解析する。値の構文からアリティを決めるので、
 * 値名のない required スペリングは作れない。
 */
export function parseFlag(flag: string): ParsedFlag {
  const long = LONG_FLAG.exec(flag);
  if (long) {
    const [, name, required, optional] = long;
    if (required !== undefined) return { kind: 'long', name, arity: 'required', valueName: required };
    if (optional !== undefined) return { kind: 'long', name, arity: 'optional', valueName: optional };
    return { kind: 'long', name, arity: 'none', valueName: null };
  }

  const short = SHORT_FLAG.exec(flag);
  if (short) {
    const [, name, required, optional] = short;
    if (required !== undefined) return { kind: 'short', name, arity: 'required', valueName: required };
    if (optional !== undefined) return { kind: 'short', name, arity: 'optional', valueName: optional };
    return { kind: 'short', name, arity: 'none', valueName: null };
  }

  throw new ArgSpecError(`invalid flag syntax '${flag}'`);
}

// ==================== 構築と検証 ====================

function isValueList(def: ValuesDef): def is readonly string[] {
  return Array.isArray(def);
}

function buildValues(id: string, def: ValuesDef | undefined): ValueKey[] | null {
  if (def === undefined) return null;

  const keys: ValueKey[] = [];
  if (isValueList(def)) {
    for (const member of def) keys.push({ key: member, member });
  } else {
    for (const [member, aliases] of Object.entries(def)) {
      for (const key of aliases) keys.push({ key, member });
    }
  }

  if (keys.length === 0) {
    throw new ArgSpecError(`option '${id}' declares an empty value table`);
  }
  const seen = new Set<string>();
  for (const { key } of keys) {
    if (seen.has(key)) throw new ArgSpecError(`option '${id}' declares value '${key}' twice`);
    seen.add(key);
  }
  return keys;
}

function checkMember(id: string, values: readonly ValueKey[] | null, value: string | undefined): void {
  if (value === undefined || values === null) return;
  if (!values.some(v => v.member === value)) {
    throw new ArgSpecError(`default '${value}' of option '${id}' is not one of its values`);
  }
}

function buildOption(
  def: OptionDef,
  builtin: OptionSpec['builtin'] = null
): OptionSpec {
  if (!def.id) throw new ArgSpecError('option id must not be empty');

  const values = buildValues(def.id, def.values);
  checkMember(def.id, values, def.default);

  const spellings = def.flags.map((entry): Spelling => {
    const flagDef: FlagDef = typeof entry === 'string' ? { flag: entry } : entry;
    const parsed = parseFlag(flagDef.flag);

    if (flagDef.default !== undefined && parsed.arity === 'required') {
      throw new ArgSpecError(`flag '${flagDef.flag}' requires a value and cannot have a default`);
    }
    checkMember(def.id, values, flagDef.default);

    return {
      kind: parsed.kind,
      name: parsed.name,
      flag: parsed.kind === 'long' ? `--${parsed.name}` : `-${parsed.name}`,
      arity: parsed.arity,
      valueName: parsed.valueName,
      hidden:
        flagDef.hidden ?? def.hidden ?? (parsed.kind === 'long' && parsed.name.startsWith('-')),
      default: flagDef.default ?? null,
      help: flagDef.help ?? null,
    };
  });

  if (def.hint !== undefined) {
    if (values !== null) {
      throw new ArgSpecError(`option '${def.id}' cannot have both a value hint and a value table`);
    }
    if (spellings.every(s => s.arity === 'none')) {
      throw new ArgSpecError(`option '${def.id}' takes no value but declares a value hint`);
    }
  }

  return {
    id: def.id,
    spellings,
    values,
    hint: def.hint ?? null,
    default: def.default ?? null,
    help: def.help ?? null,
    builtin,
  };
}

function buildSlot(def: SlotDef): PositionalSlot {
  const arity = def.arity ?? exactly(1);
  const integral = (n: number) => Number.isInteger(n) && n >= 0;

  switch (arity.kind) {
    case 'exactly':
      if (!integral(arity.n) || arity.n === 0) {
        throw new ArgSpecError(`operand '${def.id}' must take at least one value`);
      }
      break;
    case 'range':
      if (!integral(arity.min) || !integral(arity.max) || arity.min > arity.max || arity.max === 0) {
        throw new ArgSpecError(`operand '${def.id}' has an invalid range ${arity.min}..${arity.max}`);
      }
      break;
    case 'atLeast':
      if (!integral(arity.n)) {
        throw new ArgSpecError(`operand '${def.id}' has an invalid minimum ${arity.n}`);
      }
      break;
  }

  if (def.greedy && arity.kind !== 'atLeast') {
    throw new ArgSpecError(`greedy operand '${def.id}' must be declared with atLeast()`);
  }

  return { id: def.id, arity, greedy: def.greedy ?? false, help: def.help ?? null };
}

function buildSlots(defs: readonly SlotDef[]): PositionalSlot[] {
  const slots = defs.map(buildSlot);
  const ids = new Set<string>();
  let unboundedSeen = false;

  slots.forEach((slot, i) => {
    if (ids.has(slot.id)) throw new ArgSpecError(`operand '${slot.id}' is declared twice`);
    ids.add(slot.id);

    if (slot.greedy) {
      if (i !== slots.length - 1) {
        throw new ArgSpecError(`greedy operand '${slot.id}' must be the last operand`);
      }
      if (slots.slice(0, i).some(s => s.arity.kind === 'atLeast')) {
        throw new ArgSpecError(`greedy operand '${slot.id}' cannot follow an unbounded operand`);
      }
    }

    if (slot.arity.kind === 'atLeast') {
      if (unboundedSeen) {
        throw new ArgSpecError(
          `operand '${slot.id}' is unbounded and no fixed operand separates it from the previous one`
        );
      }
      unboundedSeen = true;
    } else if (slot.arity.kind === 'exactly') {
      unboundedSeen = false;
    }
  });

  return slots;
}

const NUMERIC_SUFFIX = /^[^\d\s]*$/;

/**
 * 定義を検証し、不変の ArgSpec を作る
 */
export function createArgSpec(def: ArgSpecDef): ArgSpec {
  const options = (def.options ?? []).map(o => buildOption(o));

  const helpFlags = def.help === false ? [] : (def.help ?? ARGS_CONFIG.HELP_FLAGS);
  const versionFlags = def.version === false ? [] : (def.version ?? ARGS_CONFIG.VERSION_FLAGS);
  if (helpFlags.length > 0) options.push(buildOption({ id: 'help', flags: helpFlags }, 'help'));
  if (versionFlags.length > 0) {
    options.push(buildOption({ id: 'version', flags: versionFlags }, 'version'));
  }

  const byId = new Map<string, OptionSpec>();
  const shortTable = new Map<string, SpellingRef>();
  const longTable = new Map<string, SpellingRef>();
  const longNames: string[] = [];

  for (const option of options) {
    if (byId.has(option.id)) throw new ArgSpecError(`option '${option.id}' is declared twice`);
    byId.set(option.id, option);

    for (const spelling of option.spellings) {
      const table = spelling.kind === 'short' ? shortTable : longTable;
      if (table.has(spelling.name)) {
        throw new ArgSpecError(`flag '${spelling.flag}' is declared twice`);
      }
      table.set(spelling.name, { option, spelling });
      if (spelling.kind === 'long') longNames.push(spelling.name);
    }
  }

  const operands = buildSlots(def.operands ?? []);
  const operandLayouts = (def.operandLayouts ?? []).map(layout => {
    if (!byId.has(layout.when)) {
      throw new ArgSpecError(`operand layout refers to unknown option '${layout.when}'`);
    }
    return { when: layout.when, slots: buildSlots(layout.operands) };
  });

  if (
    operandLayouts.length > 0 &&
    [operands, ...operandLayouts.map(l => l.slots)].some(slots => slots.some(s => s.greedy))
  ) {
    throw new ArgSpecError('greedy operands cannot be combined with alternative operand layouts');
  }

  const numeric = (def.numeric ?? []).map((n): DeprecatedNumeric => {
    const target = byId.get(n.target);
    if (!target || target.builtin !== null) {
      throw new ArgSpecError(`numeric shorthand refers to unknown option '${n.target}'`);
    }
    const suffix = n.suffix ?? '';
    if (!NUMERIC_SUFFIX.test(suffix)) {
      throw new ArgSpecError(`numeric shorthand suffix '${suffix}' must not contain digits`);
    }
    return {
      sign: n.sign,
      target: n.target,
      suffix,
      firstOnly: n.firstOnly ?? false,
      transform: n.transform ?? (m => m.digits + m.suffix),
    };
  });

  // フラグを持たないオプションは数値省略形からのみ到達できる
  for (const option of options) {
    if (option.spellings.length === 0 && !numeric.some(n => n.target === option.id)) {
      throw new ArgSpecError(`option '${option.id}' has no flags`);
    }
  }

  return Object.freeze({
    options,
    shortTable,
    longTable,
    longNames,
    operands,
    operandLayouts,
    numeric,
    numericPrecedence: def.numericPrecedence ?? ARGS_CONFIG.NUMERIC_PRECEDENCE,
    permute: def.permute ?? true,
  });
}

/**
 * ヘルプ生成用: 隠しスペリングと組み込みオプションを除いた一覧
 */
export function visibleOptions(spec: ArgSpec): OptionSpec[] {
  return spec.options
    .filter(o => o.builtin === null)
    .map(o => ({ ...o, spellings: o.spellings.filter(s => !s.hidden) }))
    .filter(o => o.spellings.length > 0);
}

export function findOption(spec: ArgSpec, id: string): OptionSpec | undefined {
  return spec.options.find(o => o.id === id);
}
