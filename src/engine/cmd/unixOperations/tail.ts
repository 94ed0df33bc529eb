import {
  InvalidValueError,
  atLeast,
  createArgSpec,
  requireValue,
  toBigInt,
  toEnum,
  toInteger,
  toNumber,
} from '@/engine/args';
import type { ArgEvent, NumericMatch, NumericSign } from '@/engine/args';

import { UnixCommandBase } from './base';

const FOLLOW_MODES = ['descriptor', 'name'] as const;

export type FollowMode = (typeof FOLLOW_MODES)[number];
export type TailMode = 'bytes' | 'lines' | 'blocks';

/**
 * 符号付きの件数。'+' はファイル先頭から数える
 */
export interface SignedCount {
  sign: NumericSign;
  /** u64 の範囲をそのまま保持する */
  count: bigint;
}

export interface TailSettings {
  follow: FollowMode | null;
  maxUnchangedStats: number;
  mode: TailMode;
  number: SignedCount;
  pid: number | null;
  retry: boolean;
  sleepInterval: number;
  verbose: boolean;
  presumeInputPipe: boolean;
  zeroTerminated: boolean;
  inputs: string[];
}

// `-20` `+20` `-100cf` を obsolete オプションの値 ('-20' など) に書き換える
const shorthand = (sign: NumericSign) => ({
  sign,
  target: 'obsolete',
  suffix: 'bclf',
  firstOnly: true,
  transform: (m: NumericMatch) => `${m.sign}${m.digits}${m.suffix}`,
});

const tailSpec = createArgSpec({
  options: [
    { id: 'bytes', flags: ['-c NUM', '--bytes=NUM'] },
    {
      id: 'follow',
      flags: ['-f', '--follow[=HOW]'],
      values: FOLLOW_MODES,
      default: 'descriptor',
    },
    { id: 'follow-retry', flags: ['-F'], help: 'same as --follow=name --retry' },
    { id: 'max-unchanged-stats', flags: ['--max-unchanged-stats=N'] },
    { id: 'lines', flags: ['-n NUM', '--lines=NUM'] },
    { id: 'pid', flags: ['--pid=PID'] },
    { id: 'quiet', flags: ['-q', '--quiet', '--silent'] },
    { id: 'retry', flags: ['--retry'] },
    { id: 'sleep-interval', flags: ['-s N', '--sleep-interval=N'] },
    { id: 'verbose', flags: ['-v', '--verbose'] },
    { id: 'zero-terminated', flags: ['-z', '--zero-terminated'] },
    { id: 'presume-input-pipe', flags: ['---presume-input-pipe'] },
    { id: 'obsolete', flags: [] },
  ],
  operands: [{ id: 'FILE', arity: atLeast(0) }],
  numeric: [shorthand('-'), shorthand('+')],
});

/**
 * `-c` / `-n` の値。先頭の '+' は先頭から、'-' または符号なしは末尾から
 */
export function parseSignedCount(option: string, raw: string): SignedCount {
  const sign: NumericSign = raw.startsWith('+') ? '+' : '-';
  const digits = /^[+-]/.test(raw) ? raw.slice(1) : raw;
  return { sign, count: toBigInt(option, digits, 'u64') };
}

const OBSOLETE = /^([+-])(\d+)([bcl]?)(f?)$/;

function applyObsolete(s: TailSettings, flag: string, value: string): void {
  const match = OBSOLETE.exec(value);
  if (!match) throw new InvalidValueError(flag, value, 'invalid shorthand');

  const [, sign, digits, unit, follow] = match;
  s.number = { sign: sign === '+' ? '+' : '-', count: toBigInt(flag, digits, 'u64') };
  s.mode = unit === 'c' ? 'bytes' : unit === 'b' ? 'blocks' : 'lines';
  s.follow = follow === 'f' ? 'descriptor' : null;
}

/**
 * tail - ファイルの末尾を出力
 *
 * 使用法:
 *   tail [OPTION]... [FILE]...
 *   tail -NUM[bcl][f] [FILE]    (旧式。最初の引数のみ)
 */
export class TailCommand extends UnixCommandBase<TailSettings> {
  readonly name = 'tail';
  protected readonly spec = tailSpec;

  protected initial(): TailSettings {
    return {
      follow: null,
      maxUnchangedStats: 5,
      mode: 'lines',
      number: { sign: '-', count: 10n },
      pid: null,
      retry: false,
      sleepInterval: 1,
      verbose: false,
      presumeInputPipe: false,
      zeroTerminated: false,
      inputs: [],
    };
  }

  protected apply(s: TailSettings, event: ArgEvent): TailSettings {
    if (event.kind === 'operand') {
      s.inputs.push(event.value);
      return s;
    }
    if (event.kind !== 'option') return s;

    switch (event.id) {
      case 'bytes':
        s.mode = 'bytes';
        s.number = parseSignedCount(event.flag, requireValue(event));
        break;
      case 'lines':
        s.mode = 'lines';
        s.number = parseSignedCount(event.flag, requireValue(event));
        break;
      case 'obsolete':
        applyObsolete(s, event.flag, requireValue(event));
        break;
      case 'follow':
        s.follow = toEnum(event.flag, requireValue(event), FOLLOW_MODES);
        break;
      case 'follow-retry':
        s.follow = 'name';
        s.retry = true;
        break;
      case 'max-unchanged-stats':
        s.maxUnchangedStats = toInteger(event.flag, requireValue(event));
        break;
      case 'pid':
        s.pid = toInteger(event.flag, requireValue(event));
        break;
      case 'quiet':
        s.verbose = false;
        break;
      case 'retry':
        s.retry = true;
        break;
      case 'sleep-interval':
        s.sleepInterval = toNumber(event.flag, requireValue(event));
        break;
      case 'verbose':
        s.verbose = true;
        break;
      case 'zero-terminated':
        s.zeroTerminated = true;
        break;
      case 'presume-input-pipe':
        s.presumeInputPipe = true;
        break;
    }
    return s;
  }
}
