/**
 * DiarizeTranscribeCommand.ts
 *
 * `diarize-transcribe <audio_file> [options]`
 *
 * Runs diarization and transcription on one file and prints or saves the
 * speaker-attributed transcript.
 */

import type { AudioLoader } from '../../Core/Protocols/Audio/AudioLoader';
import {
  type AsrModelVersion,
  parseModelVersion,
} from '../../Core/Protocols/Voice/STTService';
import {
  DEFAULT_CLUSTERING_THRESHOLD,
  type DiarizeTranscribeConfigurationOptions,
  DiarizeTranscribeConfigurationImpl,
  parseClusteringThreshold,
} from '../../Foundation/Configuration/DiarizeTranscribeConfiguration';
import { ServiceRegistry } from '../../Foundation/DependencyInjection/ServiceRegistry';
import { asSDKError } from '../../Foundation/ErrorTypes/SDKError';
import type { PipelineEventEmitter } from '../../Foundation/Events/PipelineEvents';
import { SDKLogger } from '../../Foundation/Logging/Logger/SDKLogger';
import { LoggingManager } from '../../Foundation/Logging/Services/LoggingManager';
import { type LogLevel, parseLogLevel } from '../../Foundation/Logging/Models/LogLevel';
import { DiarizedTranscriptionPipeline } from '../../Features/DiarizedTranscription/DiarizedTranscriptionPipeline';
import { TranscriptWriter } from '../../Infrastructure/FileOutput/TranscriptWriter';
import {
  PrecomputedDiarizationProvider,
  PrecomputedTranscriptionProvider,
} from '../../Infrastructure/Precomputed/PrecomputedServices';
import {
  formatTranscriptReport,
  serializeTranscript,
} from '../../Infrastructure/Serialization/TranscriptSerializer';

const logger = new SDKLogger('DiarizeTranscribe');

/** Precomputed output passed on the command line wins over registered backends */
const PRECOMPUTED_PROVIDER_PRIORITY = 1000;

export type ParsedArguments =
  | { readonly kind: 'help' }
  | { readonly kind: 'error'; readonly message: string }
  | {
      readonly kind: 'run';
      readonly audioFile: string;
      readonly options: DiarizeTranscribeConfigurationOptions;
      readonly diarizationFile: string | null;
      readonly transcriptionFile: string | null;
      readonly printJson: boolean;
    };

export interface CommandContext {
  /** Receives the transcript when no output file is given */
  readonly stdout?: (text: string) => void;
  readonly env?: NodeJS.ProcessEnv;
  readonly registry?: ServiceRegistry;
  readonly audioLoader?: AudioLoader;
  readonly writer?: TranscriptWriter;
  readonly events?: PipelineEventEmitter;
}

export function parseArguments(args: readonly string[]): ParsedArguments {
  let audioFile: string | null = null;
  let clusteringThreshold: number | undefined;
  let outputFile: string | undefined;
  let modelVersion: AsrModelVersion | undefined;
  let includeWordTimings: boolean | undefined;
  let runStagesConcurrently: boolean | undefined;
  let logLevel: LogLevel | undefined;
  let diarizationFile: string | null = null;
  let transcriptionFile: string | null = null;
  let printJson = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const next = args[i + 1];

    switch (arg) {
      case '--threshold':
        if (next !== undefined) {
          clusteringThreshold = parseClusteringThreshold(next) ?? DEFAULT_CLUSTERING_THRESHOLD;
          i++;
        }
        break;
      case '--output':
        if (next !== undefined) {
          outputFile = next;
          i++;
        }
        break;
      case '--model-version':
        if (next !== undefined) {
          const version = parseModelVersion(next);
          if (version === null) {
            return { kind: 'error', message: `Invalid model version: ${next}. Use 'v2' or 'v3'` };
          }
          modelVersion = version;
          i++;
        }
        break;
      case '--no-word-timings':
        includeWordTimings = false;
        break;
      case '--diarization':
        if (next !== undefined) {
          diarizationFile = next;
          i++;
        }
        break;
      case '--transcription':
        if (next !== undefined) {
          transcriptionFile = next;
          i++;
        }
        break;
      case '--json':
        printJson = true;
        break;
      case '--concurrent':
        runStagesConcurrently = true;
        break;
      case '--log-level':
        if (next !== undefined) {
          const level = parseLogLevel(next);
          if (level === null) {
            return { kind: 'error', message: `Invalid log level: ${next}` };
          }
          logLevel = level;
          i++;
        }
        break;
      case '--help':
      case '-h':
        return { kind: 'help' };
      default:
        if (arg.startsWith('-')) {
          logger.warning(`Unknown option: ${arg}`);
        } else if (audioFile === null) {
          audioFile = arg;
        } else {
          logger.warning(`Ignoring extra argument: ${arg}`);
        }
    }
  }

  if (audioFile === null) {
    return { kind: 'error', message: 'No audio file specified' };
  }

  return {
    kind: 'run',
    audioFile,
    options: {
      clusteringThreshold,
      outputFile,
      modelVersion,
      includeWordTimings,
      runStagesConcurrently,
      logLevel,
    },
    diarizationFile,
    transcriptionFile,
    printJson,
  };
}

/**
 * Run the command.
 *
 * @returns the process exit code
 */
export async function runDiarizeTranscribe(
  args: readonly string[],
  context: CommandContext = {}
): Promise<number> {
  const stdout = context.stdout ?? ((text: string) => void process.stdout.write(text));
  const parsed = parseArguments(args);

  if (parsed.kind === 'help') {
    stdout(usage());
    return 0;
  }
  if (parsed.kind === 'error') {
    logger.error(parsed.message);
    stdout(usage());
    return 1;
  }

  try {
    const configuration = DiarizeTranscribeConfigurationImpl.fromEnvironment(
      context.env ?? process.env,
      parsed.options
    );
    configuration.validate();
    LoggingManager.shared.setLogLevel(configuration.logLevel);

    const registry = context.registry ?? ServiceRegistry.shared;
    if (parsed.diarizationFile !== null) {
      registry.registerSpeakerDiarizationProvider(
        new PrecomputedDiarizationProvider(parsed.diarizationFile),
        PRECOMPUTED_PROVIDER_PRIORITY
      );
    }
    if (parsed.transcriptionFile !== null) {
      registry.registerSTTProvider(
        new PrecomputedTranscriptionProvider(parsed.transcriptionFile),
        PRECOMPUTED_PROVIDER_PRIORITY
      );
    }

    const pipeline = await DiarizedTranscriptionPipeline.fromRegistry({
      modelVersion: configuration.modelVersion,
      registry,
      audioLoader: context.audioLoader,
      events: context.events,
    });
    const transcript = await pipeline.process(parsed.audioFile, configuration);

    if (configuration.outputFile !== null) {
      const writer = context.writer ?? new TranscriptWriter();
      const writtenPath = await writer.write(transcript, configuration.outputFile);
      logger.info(`Results saved to: ${writtenPath}`);
    } else if (parsed.printJson) {
      stdout(`${serializeTranscript(transcript)}\n`);
    } else {
      stdout(formatTranscriptReport(transcript));
    }
    return 0;
  } catch (error) {
    const sdkError = asSDKError(error);
    logger.error(`Failed to process audio: ${sdkError.message}`, sdkError.toLogMetadata());
    return 1;
  }
}

export function usage(): string {
  return `
Diarize-Transcribe Command Usage:
    diarize-transcribe <audio_file> [options]

Description:
    Performs speaker diarization and speech recognition in one pass,
    producing a speaker-attributed transcript with timestamps.

Options:
    --threshold <float>           Clustering threshold for speaker separation (default: ${DEFAULT_CLUSTERING_THRESHOLD})
    --output <file>               Save results to JSON file (default: print to stdout)
    --model-version <version>     ASR model: v2 (English) or v3 (Multilingual) (default: v3)
    --no-word-timings             Exclude word-level timings from output
    --diarization <file>          Use precomputed diarization output (JSON)
    --transcription <file>        Use precomputed transcription output (JSON)
    --json                        Print JSON instead of the text report
    --concurrent                  Run diarization and transcription concurrently
    --log-level <level>           debug, info, warning or error (default: info)
    --help, -h                    Show this help message

Examples:
    # Basic usage
    diarize-transcribe podcast.wav

    # Save to JSON file
    diarize-transcribe podcast.wav --output transcript.json

    # Merge precomputed collaborator output
    diarize-transcribe podcast.wav --diarization speakers.json --transcription asr.json
`;
}
