/**
 * 引数解析エンジン エクスポート
 *
 * GNU coreutils 互換のオプション・オペランド解析
 */

// spec - 引数定義
export {
  createArgSpec,
  parseFlag,
  visibleOptions,
  findOption,
  exactly,
  range,
  atLeast,
  arityMin,
  arityMax,
} from './spec';
export type {
  ArgSpec,
  ArgSpecDef,
  OptionDef,
  FlagDef,
  SlotDef,
  NumericDef,
  ValuesDef,
  OptionSpec,
  Spelling,
  ValueArity,
  ValueKey,
  ValueHint,
  Arity,
  PositionalSlot,
  OperandLayout,
  DeprecatedNumeric,
  NumericMatch,
  NumericSign,
  NumericPrecedence,
} from './spec';

// tokenizer / prefix / matcher / positional
export { Tokenizer, matchNumeric } from './tokenizer';
export type { Token, RawArg } from './tokenizer';
export { resolvePrefix, resolvedName } from './prefix';
export type { Resolution } from './prefix';
export { OptionMatcher, resolveValue } from './matcher';
export type { MatchResult, OptionToken } from './matcher';
export { allocate, greedyStart, selectLayout } from './positional';
export type { TrailingCapture } from './positional';

// events / reducer / values
export type { ArgEvent, OptionEvent, ParseRequest } from './events';
export { fold } from './reducer';
export type { Apply, Env, SettingsDef } from './reducer';
export { toBigInt, toInteger, toNumber, toEnum, requireValue } from './values';
export type { IntegerKind } from './values';

// parser
export { parseArgs, parseSettings, tryParseArgs, tryParseSettings } from './parser';
export type { ParseOptions, ParseOutcome, SettingsOutcome, Result } from './parser';

// errors
export {
  ArgError,
  ArgSpecError,
  UnknownOptionError,
  AmbiguousOptionError,
  AmbiguousValueError,
  MissingValueError,
  UnexpectedValueError,
  InvalidValueError,
  MissingOperandError,
  ExcessOperandError,
} from './errors';
export type { ArgErrorKind } from './errors';

// completion
export { renderCompletion, renderFishCompletion } from './completion';
export type { CompletionShell } from './completion';
