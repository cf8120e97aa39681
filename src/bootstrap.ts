/**
 * Assistant bootstrap
 * Wires the components from configuration plus the platform adapters the
 * host supplies (location, speech).
 */

import { ConfigError, getConfig, getConfigSummary, type AppConfig } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import type { RandomSource } from './lib/random/random-source.js';
import type { Scheduler } from './lib/reliability/scheduler.js';
import { createChatProvider } from './llm/factory.js';
import type { GenerativeChatAPI } from './llm/types.js';
import { ConversationClient } from './services/conversation/conversation-client.js';
import { LocationResolver } from './services/location/location-resolver.js';
import type {
  LocationPermissionProvider,
  LocationProvider,
  ReverseGeocodeProvider
} from './services/location/location.types.js';
import { SessionController } from './services/session/session-controller.js';
import { SpeechCaptureService } from './services/speech/speech-capture.service.js';
import type {
  AudioCaptureProvider,
  SpeechPermissionProvider,
  SpeechRecognitionProvider
} from './services/speech/speech.types.js';
import { AssistantDataStore } from './store/assistant-data.store.js';
import { JsonFilePersistenceStore } from './store/json-file-persistence.store.js';
import type { PersistenceStore } from './store/persistence.types.js';

export interface SpeechPlatform {
  permissions: SpeechPermissionProvider;
  audio: AudioCaptureProvider;
  recognizer: SpeechRecognitionProvider;
}

export interface AssistantPlatform {
  locationPermissions: LocationPermissionProvider;
  locations: LocationProvider;
  geocoder: ReverseGeocodeProvider;
  /** Omit on hosts without a microphone */
  speech?: SpeechPlatform;
}

export interface CreateAssistantDeps {
  platform: AssistantPlatform;
  config?: AppConfig;
  /** Overrides the provider chosen by LLM_PROVIDER */
  chat?: GenerativeChatAPI;
  persistence?: PersistenceStore;
  scheduler?: Scheduler;
  random?: RandomSource;
}

export interface Assistant {
  readonly controller: SessionController;
  readonly store: AssistantDataStore;
  readonly location: LocationResolver;
  readonly speech: SpeechCaptureService | undefined;
  /** Load persisted state, start location tracking and connect */
  start(): Promise<boolean>;
  /** Disconnect, stop location tracking and wait for pending writes */
  shutdown(): Promise<void>;
}

export function createAssistant(deps: CreateAssistantDeps): Assistant {
  const config = deps.config ?? getConfig();
  const chat = deps.chat ?? createChatProvider(config);
  if (!chat) {
    throw new ConfigError(
      config.llmProvider === 'none'
        ? 'LLM_PROVIDER is none and no chat provider was supplied'
        : 'OPENAI_API_KEY is not set'
    );
  }

  logger.info(getConfigSummary(config), '[Bootstrap] creating assistant');

  const store = new AssistantDataStore(
    deps.persistence ?? new JsonFilePersistenceStore(config.stateFile),
    { maxRecentSearches: config.maxRecentSearches }
  );

  const location = new LocationResolver({
    permissions: deps.platform.locationPermissions,
    locations: deps.platform.locations,
    geocoder: deps.platform.geocoder,
    ...(deps.scheduler ? { scheduler: deps.scheduler } : {})
  });

  const speechPlatform = deps.platform.speech;
  const speech = speechPlatform
    ? new SpeechCaptureService({
        permissions: speechPlatform.permissions,
        audio: speechPlatform.audio,
        recognizer: speechPlatform.recognizer,
        voiceInputEnabled: config.features.voiceInput
      })
    : undefined;

  const conversation = new ConversationClient(chat, { timeoutMs: config.llmTimeoutMs });

  const controller = new SessionController({
    store,
    conversation,
    location,
    generation: config.generation,
    ...(speech ? { speech } : {}),
    ...(deps.random ? { random: deps.random } : {})
  });

  return {
    controller,
    store,
    location,
    speech,
    async start() {
      await store.load();
      location.start();
      return controller.connect();
    },
    async shutdown() {
      controller.dispose();
      location.stop();
      await store.flush();
      logger.info('[Bootstrap] assistant shut down');
    }
  };
}
