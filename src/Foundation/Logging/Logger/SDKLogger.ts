/**
 * SDKLogger.ts
 *
 * Category logger. All output goes through LoggingManager.shared.
 */

import { LoggingManager } from '../Services/LoggingManager';
import { LogLevel } from '../Models/LogLevel';

export class SDKLogger {
  private category: string;

  constructor(category: string = 'SDK') {
    this.category = category;
  }

  public debug(message: string, metadata?: Record<string, unknown>): void {
    LoggingManager.shared.log(LogLevel.Debug, this.category, message, metadata);
  }

  public info(message: string, metadata?: Record<string, unknown>): void {
    LoggingManager.shared.log(LogLevel.Info, this.category, message, metadata);
  }

  public warning(message: string, metadata?: Record<string, unknown>): void {
    LoggingManager.shared.log(LogLevel.Warning, this.category, message, metadata);
  }

  public error(message: string, metadata?: Record<string, unknown>): void {
    LoggingManager.shared.log(LogLevel.Error, this.category, message, metadata);
  }
}
