export * from './engine/args';
export * from './engine/cmd/unixOperations';
export { UnixCommands } from './engine/cmd/unix';
export type { RegisteredCommand } from './engine/cmd/unix';
export { loggerStore, clearAllLogs, formatLogEntry, takeLogMessages } from './stores/loggerStore';
export type { LogEntry, LogLevel } from './stores/loggerStore';
