import { describe, it, expect, vi } from 'vitest';

import { LOG_CONFIG } from '@/constants/config';
import {
  clearAllLogs,
  formatLogEntry,
  loggerStore,
  pushLogMessage,
  takeLogMessages,
} from '@/stores/loggerStore';

/**
 * ログストアのテスト
 */

describe('loggerStore', () => {
  it('連続する同じメッセージは回数を増やす', () => {
    pushLogMessage('token short 0', 'info', 'args');
    pushLogMessage('token short 0', 'info', 'args');
    pushLogMessage('token short 0', 'info', 'other');

    expect(loggerStore.messages).toHaveLength(2);
    expect(loggerStore.messages[0].count).toBe(2);
    expect(loggerStore.messages[1].context).toBe('other');
    expect(formatLogEntry(loggerStore.messages[0])).toBe('[args] token short 0 (x2)');
    expect(formatLogEntry(loggerStore.messages[1])).toBe('[other] token short 0');
  });

  it('level と context の既定値', () => {
    pushLogMessage('plain');
    expect(loggerStore.messages).toEqual([{ message: 'plain', type: 'info', context: 'unknown' }]);
  });

  it('最大数を超えた古いメッセージを捨てる', () => {
    const max = LOG_CONFIG.MAX_ENTRIES;
    for (let i = 0; i <= max; i++) pushLogMessage(`m${i}`);

    expect(loggerStore.messages).toHaveLength(max);
    expect(loggerStore.messages[0].message).toBe('m1');
  });

  it('warn と error はコンソールにも出す', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    pushLogMessage('careful', 'warn', 'args');
    pushLogMessage('broken', 'error', 'args');
    pushLogMessage('plain', 'info');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[args] careful');
    expect(error).toHaveBeenCalledWith('[args] broken');
    warn.mockRestore();
    error.mockRestore();
  });

  it('context 単位で取り出す', () => {
    pushLogMessage('a', 'info', 'args');
    pushLogMessage('b', 'info', 'other');
    pushLogMessage('c', 'info', 'args');

    expect(takeLogMessages('args').map(m => m.message)).toEqual(['a', 'c']);
    expect(loggerStore.messages.map(m => m.message)).toEqual(['b']);

    clearAllLogs();
    expect(loggerStore.messages).toEqual([]);
  });
});
