/**
 * LoggingManager.ts
 *
 * Centralized logging manager with multiple destination support
 */

import { LogLevel, getLogLevelDescription } from '../Models/LogLevel';

// ============================================================================
// Log Entry
// ============================================================================

export interface LogEntry {
  /** Log level */
  level: LogLevel;
  /** Category/subsystem */
  category: string;
  /** Log message */
  message: string;
  /** Optional metadata */
  metadata?: Record<string, unknown>;
  /** Timestamp */
  timestamp: Date;
}

// ============================================================================
// Log Destination Protocol
// ============================================================================

export interface LogDestination {
  /** Unique identifier for this destination */
  identifier: string;
  /** Human-readable name */
  name: string;
  /** Whether destination is available */
  isAvailable: boolean;
  /** Write a log entry */
  write(entry: LogEntry): void;
  /** Flush pending writes */
  flush(): void;
}

// ============================================================================
// Console Destination
// ============================================================================

/**
 * Console log destination (default).
 * Writes to stderr so that transcript output on stdout stays clean.
 */
export class ConsoleLogDestination implements LogDestination {
  readonly identifier = 'console';
  readonly name = 'Console';
  readonly isAvailable = true;

  private readonly output: Console;

  constructor(stream: NodeJS.WritableStream = process.stderr) {
    this.output = new console.Console({ stdout: stream, stderr: stream });
  }

  write(entry: LogEntry): void {
    const logMessage = formatLogEntry(entry);
    const metadata = entry.metadata ?? '';

    switch (entry.level) {
      case LogLevel.Debug:
        this.output.debug(logMessage, metadata);
        break;
      case LogLevel.Info:
        this.output.info(logMessage, metadata);
        break;
      case LogLevel.Warning:
        this.output.warn(logMessage, metadata);
        break;
      case LogLevel.Error:
      case LogLevel.Fault:
        this.output.error(logMessage, metadata);
        break;
    }
  }

  flush(): void {
    // Console writes are unbuffered
  }
}

// ============================================================================
// Event Destination (for public exposure)
// ============================================================================

export type LogEventCallback = (entry: LogEntry) => void;

/**
 * Event-based log destination. Lets external consumers subscribe to log entries.
 */
export class EventLogDestination implements LogDestination {
  readonly identifier = 'event';
  readonly name = 'Event Emitter';
  readonly isAvailable = true;

  private callbacks: Set<LogEventCallback> = new Set();

  /**
   * Subscribe to log events
   * @returns Unsubscribe function
   */
  subscribe(callback: LogEventCallback): () => void {
    this.callbacks.add(callback);
    return () => {
      this.callbacks.delete(callback);
    };
  }

  write(entry: LogEntry): void {
    // A throwing subscriber propagates to LoggingManager.log, which reports it.
    for (const callback of this.callbacks) {
      callback(entry);
    }
  }

  flush(): void {
    // No buffering
  }
}

// ============================================================================
// Logging Manager
// ============================================================================

export class LoggingManager {
  private static sharedInstance: LoggingManager | null = null;
  private logLevel: LogLevel = LogLevel.Info;
  private destinations: Map<string, LogDestination> = new Map();

  private readonly eventDestination = new EventLogDestination();

  private constructor() {
    this.addDestination(new ConsoleLogDestination());
    this.addDestination(this.eventDestination);
  }

  public static get shared(): LoggingManager {
    if (!LoggingManager.sharedInstance) {
      LoggingManager.sharedInstance = new LoggingManager();
    }
    return LoggingManager.sharedInstance;
  }

  // ============================================================================
  // Configuration
  // ============================================================================

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  // ============================================================================
  // Destination Management
  // ============================================================================

  public addDestination(destination: LogDestination): void {
    this.destinations.set(destination.identifier, destination);
  }

  public removeDestination(identifier: string): void {
    this.destinations.delete(identifier);
  }

  /**
   * Subscribe to all log events.
   *
   * @param callback - Function called for each log entry
   * @returns Unsubscribe function
   */
  public onLog(callback: LogEventCallback): () => void {
    return this.eventDestination.subscribe(callback);
  }

  // ============================================================================
  // Logging Operations
  // ============================================================================

  public log(
    level: LogLevel,
    category: string,
    message: string,
    metadata?: Record<string, unknown>
  ): void {
    if (level < this.logLevel) {
      return;
    }

    const entry: LogEntry = {
      level,
      category,
      message,
      metadata,
      timestamp: new Date(),
    };

    for (const destination of this.destinations.values()) {
      if (!destination.isAvailable) {
        continue;
      }
      try {
        destination.write(entry);
      } catch (error) {
        reportDestinationFailure(destination, error);
      }
    }
  }

  public flush(): void {
    for (const destination of this.destinations.values()) {
      try {
        destination.flush();
      } catch (error) {
        reportDestinationFailure(destination, error);
      }
    }
  }
}

/**
 * `[timestamp] [LEVEL] [category] message`
 */
export function formatLogEntry(entry: LogEntry): string {
  const timestamp = entry.timestamp.toISOString();
  const levelStr = getLogLevelDescription(entry.level);
  return `[${timestamp}] [${levelStr}] [${entry.category}] ${entry.message}`;
}

function reportDestinationFailure(destination: LogDestination, error: unknown): void {
  const reason = error instanceof Error ? error.message : String(error);
  process.stderr.write(`[LoggingManager] destination '${destination.identifier}' failed: ${reason}\n`);
}
