/**
 * LogLevel.ts
 */

export enum LogLevel {
  Debug = 0,
  Info = 1,
  Warning = 2,
  Error = 3,
  Fault = 4,
}

/**
 * Short upper-case label used in log lines.
 */
export function getLogLevelDescription(level: LogLevel): string {
  switch (level) {
    case LogLevel.Debug:
      return 'DEBUG';
    case LogLevel.Info:
      return 'INFO';
    case LogLevel.Warning:
      return 'WARN';
    case LogLevel.Error:
      return 'ERROR';
    case LogLevel.Fault:
      return 'FAULT';
  }
}

/**
 * Parse a level name as accepted on the command line and in the environment.
 * Returns null for unknown names.
 */
export function parseLogLevel(value: string): LogLevel | null {
  switch (value.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.Debug;
    case 'info':
      return LogLevel.Info;
    case 'warn':
    case 'warning':
      return LogLevel.Warning;
    case 'error':
      return LogLevel.Error;
    case 'fault':
      return LogLevel.Fault;
    default:
      return null;
  }
}
