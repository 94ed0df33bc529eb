import { describe, it, expect } from 'vitest';

import { UnknownOptionError } from '@/engine/args';
import { UnixCommands } from '@/engine/cmd/unix';

describe('UnixCommands', () => {
  const unix = new UnixCommands();

  it('登録済みのコマンド名', () => {
    expect(unix.names()).toEqual(['b2sum', 'comm', 'cp', 'ls', 'mktemp', 'tail', 'timeout']);
    expect(unix.has('ls')).toBe(true);
    expect(unix.has('rm')).toBe(false);
  });

  it('名前で解析する', () => {
    const result = unix.tryParse('b2sum', ['-l', '256', 'a'], { env: {} });
    expect(result).toEqual({
      ok: true,
      value: {
        kind: 'settings',
        settings: {
          binary: false,
          check: false,
          tag: false,
          length: 256,
          checkOutput: 'warn',
          strict: false,
          ignoreMissing: false,
          zero: false,
          files: ['a'],
        },
        trailing: null,
      },
    });
  });

  it('解析エラーは Result で返る', () => {
    const result = unix.tryParse('ls', ['--bogus'], { env: {} });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UnknownOptionError);
      expect(result.error.message).toBe("unrecognized option '--bogus'");
    }
  });

  it('--help は中断要求', () => {
    expect(unix.tryParse('cp', ['a', '--help'], { env: {} })).toEqual({
      ok: true,
      value: { kind: 'help', flag: '--help', position: 1 },
    });
  });

  it('補完スクリプト', () => {
    const lines = unix.completion('b2sum', 'fish').split('\n');
    expect(lines[0]).toBe("complete -c b2sum -s b -l binary -d 'read in binary mode'");
  });

  it('表示用のオプション一覧', () => {
    const tail = unix.options('tail');
    expect(tail.map(o => o.id)).not.toContain('presume-input-pipe');
    expect(tail.map(o => o.id)).not.toContain('help');
    expect(unix.options('b2sum').map(o => o.id)).toEqual([
      'binary',
      'check',
      'length',
      'tag',
      'text',
      'zero',
      'ignore-missing',
      'quiet',
      'status',
      'strict',
      'warn',
    ]);
  });

  it('未登録のコマンド', () => {
    expect(() => unix.tryParse('rm', [])).toThrow('rm: command not found');
    expect(() => unix.completion('rm', 'fish')).toThrow('rm: command not found');
    expect(() => unix.options('rm')).toThrow('rm: command not found');
  });
});
