/**
 * Logging Module
 *
 * Centralized logging infrastructure with multiple destination support.
 */

export { SDKLogger } from './Logger/SDKLogger';

export { LogLevel, getLogLevelDescription, parseLogLevel } from './Models/LogLevel';

export {
  LoggingManager,
  ConsoleLogDestination,
  EventLogDestination,
  formatLogEntry,
  type LogDestination,
  type LogEntry,
  type LogEventCallback,
} from './Services/LoggingManager';
