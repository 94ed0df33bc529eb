import { InvalidValueError, atLeast, createArgSpec, requireValue } from '@/engine/args';
import type { ArgEvent } from '@/engine/args';

import { UnixCommandBase } from './base';

export interface TimeoutSettings {
  /** 秒 */
  duration: number;
  /** 名前 (TERM, KILL, ...) または番号 */
  signal: string;
  killAfter: number | null;
  foreground: boolean;
  preserveStatus: boolean;
  verbose: boolean;
  command: string[];
}

const SIGNALS = [
  'HUP', 'INT', 'QUIT', 'ILL', 'TRAP', 'ABRT', 'BUS', 'FPE', 'KILL', 'USR1', 'SEGV', 'USR2',
  'PIPE', 'ALRM', 'TERM', 'STKFLT', 'CHLD', 'CONT', 'STOP', 'TSTP', 'TTIN', 'TTOU', 'URG',
  'XCPU', 'XFSZ', 'VTALRM', 'PROF', 'WINCH', 'IO', 'PWR', 'SYS',
];

const timeoutSpec = createArgSpec({
  options: [
    { id: 'foreground', flags: ['--foreground'] },
    { id: 'kill-after', flags: ['-k DURATION', '--kill-after=DURATION'] },
    { id: 'preserve-status', flags: ['--preserve-status'] },
    { id: 'signal', flags: ['-s SIGNAL', '--signal=SIGNAL'] },
    { id: 'verbose', flags: ['-v', '--verbose'] },
  ],
  operands: [
    { id: 'DURATION' },
    { id: 'COMMAND', arity: atLeast(1), greedy: true },
  ],
  // 最初のオペランド以降はコマンド側のオプション
  permute: false,
});

const DURATION = /^(\d+(?:\.\d*)?|\.\d+)([smhd]?)$/;
const UNIT_SECONDS: Record<string, number> = { '': 1, s: 1, m: 60, h: 3600, d: 86400 };

/**
 * `10` `1.5m` `2h` のような期間を秒に変換する
 */
export function parseDuration(option: string, raw: string): number {
  const match = DURATION.exec(raw);
  if (!match) throw new InvalidValueError(option, raw, 'invalid time interval');
  return Number(match[1]) * UNIT_SECONDS[match[2]];
}

/**
 * シグナル名 (`TERM`, `SIGTERM`, 小文字可) または番号を正規化する
 */
export function parseSignal(option: string, raw: string): string {
  if (/^\d+$/.test(raw)) {
    const n = Number(raw);
    if (n < 1 || n > SIGNALS.length) throw new InvalidValueError(option, raw, 'invalid signal');
    return raw;
  }
  const name = raw.toUpperCase().replace(/^SIG/, '');
  if (!SIGNALS.includes(name)) throw new InvalidValueError(option, raw, 'invalid signal');
  return name;
}

/**
 * timeout - 時間制限付きでコマンドを実行
 *
 * 使用法:
 *   timeout [OPTION] DURATION COMMAND [ARG]...
 */
export class TimeoutCommand extends UnixCommandBase<TimeoutSettings> {
  readonly name = 'timeout';
  protected readonly spec = timeoutSpec;

  protected initial(): TimeoutSettings {
    return {
      duration: 0,
      signal: 'TERM',
      killAfter: null,
      foreground: false,
      preserveStatus: false,
      verbose: false,
      command: [],
    };
  }

  protected apply(s: TimeoutSettings, event: ArgEvent): TimeoutSettings {
    if (event.kind === 'operand') {
      s.duration = parseDuration(event.id, event.value);
      return s;
    }
    if (event.kind === 'trailing') {
      s.command = [...event.values];
      return s;
    }

    switch (event.id) {
      case 'foreground':
        s.foreground = true;
        break;
      case 'kill-after':
        s.killAfter = parseDuration(event.flag, requireValue(event));
        break;
      case 'preserve-status':
        s.preserveStatus = true;
        break;
      case 'signal':
        s.signal = parseSignal(event.flag, requireValue(event));
        break;
      case 'verbose':
        s.verbose = true;
        break;
    }
    return s;
  }
}
