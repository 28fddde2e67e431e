/**
 * ServiceRegistry.ts
 *
 * Registry of diarization and STT providers. Hosts register the model
 * backends they ship; the pipeline asks for the highest-priority provider
 * that can serve the request.
 */

import type {
  SpeakerDiarizationServiceProvider,
  STTServiceProvider,
} from '../../Core/Protocols/Voice/ServiceProviders';
import type { AsrModelVersion } from '../../Core/Protocols/Voice/STTService';
import { SDKLogger } from '../Logging/Logger/SDKLogger';

interface PrioritizedProvider<T> {
  provider: T;
  priority: number;
}

/** Priority used when none is given (higher = preferred) */
export const DEFAULT_PROVIDER_PRIORITY = 100;

export class ServiceRegistry {
  private static sharedInstance: ServiceRegistry | null = null;

  private readonly logger = new SDKLogger('ServiceRegistry');
  private diarizationProviders: PrioritizedProvider<SpeakerDiarizationServiceProvider>[] = [];
  private sttProviders: PrioritizedProvider<STTServiceProvider>[] = [];

  public static get shared(): ServiceRegistry {
    if (!ServiceRegistry.sharedInstance) {
      ServiceRegistry.sharedInstance = new ServiceRegistry();
    }
    return ServiceRegistry.sharedInstance;
  }

  /**
   * Register a diarization provider. A provider with the same name is replaced.
   */
  public registerSpeakerDiarizationProvider(
    provider: SpeakerDiarizationServiceProvider,
    priority: number = DEFAULT_PROVIDER_PRIORITY
  ): void {
    this.diarizationProviders = insertByPriority(this.diarizationProviders, provider, priority);
    this.logger.debug(`Registered speaker diarization provider: ${provider.name}`, { priority });
  }

  public registerSTTProvider(
    provider: STTServiceProvider,
    priority: number = DEFAULT_PROVIDER_PRIORITY
  ): void {
    this.sttProviders = insertByPriority(this.sttProviders, provider, priority);
    this.logger.debug(`Registered STT provider: ${provider.name}`, { priority });
  }

  public speakerDiarizationProvider(): SpeakerDiarizationServiceProvider | null {
    return this.diarizationProviders[0]?.provider ?? null;
  }

  public sttProvider(modelVersion: AsrModelVersion): STTServiceProvider | null {
    const match = this.sttProviders.find(({ provider }) => provider.canHandle(modelVersion));
    return match?.provider ?? null;
  }

  public get registeredProviderNames(): { diarization: string[]; stt: string[] } {
    return {
      diarization: this.diarizationProviders.map(({ provider }) => provider.name),
      stt: this.sttProviders.map(({ provider }) => provider.name),
    };
  }

  /**
   * Remove all registered providers
   */
  public reset(): void {
    this.diarizationProviders = [];
    this.sttProviders = [];
  }
}

function insertByPriority<T extends { readonly name: string }>(
  providers: PrioritizedProvider<T>[],
  provider: T,
  priority: number
): PrioritizedProvider<T>[] {
  return [
    ...providers.filter((entry) => entry.provider.name !== provider.name),
    { provider, priority },
  ].sort((a, b) => b.priority - a.priority);
}
