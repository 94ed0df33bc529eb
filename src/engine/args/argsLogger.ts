import { pushLogMessage } from '@/stores/loggerStore';

function safeStringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'undefined') return 'undefined';
  if (value === null) return 'null';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function formatArgs(args: unknown[]): string {
  return args.map(a => safeStringify(a)).join(' ');
}

export function argsInfo(...args: unknown[]): void {
  pushLogMessage(formatArgs(args), 'info', 'args');
}

export function argsWarn(...args: unknown[]): void {
  pushLogMessage(formatArgs(args), 'warn', 'args');
}

export function argsError(...args: unknown[]): void {
  pushLogMessage(formatArgs(args), 'error', 'args');
}
