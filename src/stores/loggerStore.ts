import { proxy } from 'valtio/vanilla';

import { LOG_CONFIG } from '@/constants/config';

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  message: string;
  type: LogLevel;
  context: string;
  /** 連続して同じ内容が記録された回数 (1 回なら省略) */
  count?: number;
}

// Vanilla Valtio store (React非依存)
export const loggerStore = proxy<{ messages: LogEntry[] }>({
  messages: [],
});

export function formatLogEntry(entry: LogEntry): string {
  const repeat = entry.count && entry.count > 1 ? ` (x${entry.count})` : '';
  return `[${entry.context}] ${entry.message}${repeat}`;
}

/**
 * ストアにメッセージを記録する
 * warn / error はコンソールにも出す
 */
export function pushLogMessage(msg: string, type: LogLevel = 'info', context = 'unknown'): void {
  const { messages } = loggerStore;
  const last = messages.at(-1);

  if (last?.message === msg && last.type === type && last.context === context) {
    last.count = (last.count ?? 1) + 1;
  } else {
    messages.push({ message: msg, type, context });
  }

  const overflow = messages.length - LOG_CONFIG.MAX_ENTRIES;
  if (overflow > 0) messages.splice(0, overflow);

  const line = `[${context}] ${msg}`;
  if (type === 'warn') console.warn(line);
  else if (type === 'error') console.error(line);
}

/**
 * 指定した context のメッセージを取り出してストアから除く
 */
export function takeLogMessages(context: string): LogEntry[] {
  const taken = loggerStore.messages.filter(m => m.context === context);
  loggerStore.messages = loggerStore.messages.filter(m => m.context !== context);
  return taken;
}

export function clearAllLogs(): void {
  loggerStore.messages = [];
}
