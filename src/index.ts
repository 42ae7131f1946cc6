export * from './grid';

export { LogHandler } from './utilities/log-handler';
export { LogManager, LogType, DEFAULT_LOG_SETTINGS } from './utilities/log-manager';
export type { ILogMessage, LogMessageCallback, LogSettings } from './utilities/log-manager';
