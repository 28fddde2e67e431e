/**
 * DiarizeTranscribeConfiguration.ts
 *
 * Settings of one diarize-transcribe run. Resolved from defaults, then the
 * environment, then explicit overrides (command-line arguments).
 */

import {
  type AsrModelVersion,
  parseModelVersion,
} from '../../Core/Protocols/Voice/STTService';
import { LogLevel, parseLogLevel } from '../Logging/Models/LogLevel';
import { ValidationError } from '../ErrorTypes/ValidationError';

export const DEFAULT_CLUSTERING_THRESHOLD = 0.7;

/** Environment variables read by `fromEnvironment` */
export const ConfigurationEnvironment = {
  Threshold: 'DIARIZE_TRANSCRIBE_THRESHOLD',
  ModelVersion: 'DIARIZE_TRANSCRIBE_MODEL_VERSION',
  WordTimings: 'DIARIZE_TRANSCRIBE_WORD_TIMINGS',
  LogLevel: 'DIARIZE_TRANSCRIBE_LOG_LEVEL',
} as const;

export interface DiarizeTranscribeConfiguration {
  /** Clustering threshold handed to the diarizer (0.0 to 1.0) */
  readonly clusteringThreshold: number;
  readonly modelVersion: AsrModelVersion;
  readonly includeWordTimings: boolean;
  /** JSON output path; null prints to stdout */
  readonly outputFile: string | null;
  /** Run diarization and transcription concurrently */
  readonly runStagesConcurrently: boolean;
  readonly logLevel: LogLevel;
}

export type DiarizeTranscribeConfigurationOptions = Partial<DiarizeTranscribeConfiguration>;

export class DiarizeTranscribeConfigurationImpl implements DiarizeTranscribeConfiguration {
  public readonly clusteringThreshold: number;
  public readonly modelVersion: AsrModelVersion;
  public readonly includeWordTimings: boolean;
  public readonly outputFile: string | null;
  public readonly runStagesConcurrently: boolean;
  public readonly logLevel: LogLevel;

  constructor(options: DiarizeTranscribeConfigurationOptions = {}) {
    this.clusteringThreshold = options.clusteringThreshold ?? DEFAULT_CLUSTERING_THRESHOLD;
    this.modelVersion = options.modelVersion ?? 'v3';
    this.includeWordTimings = options.includeWordTimings ?? true;
    this.outputFile = options.outputFile ?? null;
    this.runStagesConcurrently = options.runStagesConcurrently ?? false;
    this.logLevel = options.logLevel ?? LogLevel.Info;
  }

  /**
   * Defaults overlaid with the environment, then with `overrides`.
   *
   * @throws ValidationError for unparsable environment values
   */
  static fromEnvironment(
    env: NodeJS.ProcessEnv = process.env,
    overrides: DiarizeTranscribeConfigurationOptions = {}
  ): DiarizeTranscribeConfigurationImpl {
    const issues: string[] = [];
    const fromEnv: { -readonly [K in keyof DiarizeTranscribeConfiguration]?: DiarizeTranscribeConfiguration[K] } = {};

    const threshold = env[ConfigurationEnvironment.Threshold];
    if (threshold !== undefined) {
      const value = parseClusteringThreshold(threshold);
      if (value === null) {
        issues.push(`${ConfigurationEnvironment.Threshold} is not a number: ${threshold}`);
      } else {
        fromEnv.clusteringThreshold = value;
      }
    }

    const modelVersion = env[ConfigurationEnvironment.ModelVersion];
    if (modelVersion !== undefined) {
      const value = parseModelVersion(modelVersion);
      if (value === null) {
        issues.push(`${ConfigurationEnvironment.ModelVersion} must be v2 or v3: ${modelVersion}`);
      } else {
        fromEnv.modelVersion = value;
      }
    }

    const wordTimings = env[ConfigurationEnvironment.WordTimings];
    if (wordTimings !== undefined) {
      const value = parseBoolean(wordTimings);
      if (value === null) {
        issues.push(`${ConfigurationEnvironment.WordTimings} must be true or false: ${wordTimings}`);
      } else {
        fromEnv.includeWordTimings = value;
      }
    }

    const logLevel = env[ConfigurationEnvironment.LogLevel];
    if (logLevel !== undefined) {
      const value = parseLogLevel(logLevel);
      if (value === null) {
        issues.push(`${ConfigurationEnvironment.LogLevel} is not a log level: ${logLevel}`);
      } else {
        fromEnv.logLevel = value;
      }
    }

    if (issues.length > 0) {
      throw ValidationError.configuration(issues);
    }

    return new DiarizeTranscribeConfigurationImpl({
      clusteringThreshold: overrides.clusteringThreshold ?? fromEnv.clusteringThreshold,
      modelVersion: overrides.modelVersion ?? fromEnv.modelVersion,
      includeWordTimings: overrides.includeWordTimings ?? fromEnv.includeWordTimings,
      outputFile: overrides.outputFile,
      runStagesConcurrently: overrides.runStagesConcurrently,
      logLevel: overrides.logLevel ?? fromEnv.logLevel,
    });
  }

  /**
   * @throws ValidationError when a setting is out of range
   */
  public validate(): void {
    const issues: string[] = [];
    if (
      !Number.isFinite(this.clusteringThreshold) ||
      this.clusteringThreshold < 0 ||
      this.clusteringThreshold > 1
    ) {
      issues.push(`clustering threshold must be between 0 and 1, got ${this.clusteringThreshold}`);
    }
    if (this.outputFile !== null && this.outputFile.trim().length === 0) {
      issues.push('output file must not be empty');
    }
    if (issues.length > 0) {
      throw ValidationError.configuration(issues);
    }
  }
}

/**
 * Whole-string numeric parse shared by the environment and the command line.
 * Returns null for blank or non-numeric text, including trailing garbage.
 */
export function parseClusteringThreshold(value: string): number | null {
  if (value.trim().length === 0) {
    return null;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? null : parsed;
}

function parseBoolean(value: string): boolean | null {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true;
    case '0':
    case 'false':
    case 'no':
    case 'off':
      return false;
    default:
      return null;
  }
}
