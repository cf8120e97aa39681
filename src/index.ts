export { createAssistant } from './bootstrap.js';
export type { Assistant, AssistantPlatform, CreateAssistantDeps, SpeechPlatform } from './bootstrap.js';

export { ConfigError, getConfig, getConfigSummary } from './config/env.js';
export type { AppConfig, GenerationSettings } from './config/env.js';

export * from './contracts/assistant.contracts.js';

export { logger, componentLogger } from './lib/logger/structured-logger.js';
export type { Logger } from './lib/logger/structured-logger.js';
export { haversineMeters } from './lib/geo/distance-calculator.js';
export { createSeededRandom, mathRandom } from './lib/random/random-source.js';
export type { RandomSource } from './lib/random/random-source.js';
export { systemScheduler } from './lib/reliability/scheduler.js';
export type { Scheduler, ScheduledTask } from './lib/reliability/scheduler.js';
export { TimeoutError, isTimeoutError, withTimeout } from './lib/reliability/timeout-guard.js';

export { createChatProvider } from './llm/factory.js';
export { OpenAIChatProvider, responsesApi } from './llm/openai-chat.provider.js';
export type { ChatGenerationConfig, ChatReply, ChatSessionHandle, GenerativeChatAPI } from './llm/types.js';

export { ConversationClient } from './services/conversation/conversation-client.js';
export type { ConversationSession, SendOutcome } from './services/conversation/conversation-client.js';
export {
  ConversationBusyError,
  EmptyOrUnsafeResponseError,
  FALLBACK_MESSAGES,
  SessionNotStartedError,
  TransientAPIError
} from './services/conversation/conversation.errors.js';
export type { ConversationError } from './services/conversation/conversation.errors.js';

export { extractRestaurants } from './services/extraction/entity-extractor.js';
export type { ExtractionResult } from './services/extraction/entity-extractor.js';

export { LocationResolver } from './services/location/location-resolver.js';
export { LOCATION_RETRY_POLICY } from './services/location/location-retry.schedule.js';
export type { RetryPolicy, RetrySchedule } from './services/location/location-retry.schedule.js';
export { DEFAULT_PLACE_NAME, GeocodeError } from './services/location/location.types.js';
export type {
  LocationEvent,
  LocationPermission,
  LocationPermissionProvider,
  LocationProvider,
  PermissionStatus,
  Placemark,
  ReverseGeocodeProvider
} from './services/location/location.types.js';

export { SessionController, buildLocationPrompt } from './services/session/session-controller.js';
export type { ConnectionStatus, SubmitOutcome } from './services/session/session-controller.js';
export type { RestaurantFilterCriteria } from './services/session/restaurant-filter.js';

export { SpeechCaptureService } from './services/speech/speech-capture.service.js';
export { AudioCaptureError, PermissionDeniedError } from './services/speech/speech.types.js';
export type {
  AudioCaptureProvider,
  AudioCaptureSession,
  RecognitionEvent,
  RecognitionTask,
  SpeechCaptureState,
  SpeechFailure,
  SpeechPermissionProvider,
  SpeechRecognitionProvider,
  StartListeningResult
} from './services/speech/speech.types.js';

export { AssistantDataStore } from './store/assistant-data.store.js';
export { InMemoryPersistenceStore } from './store/in-memory-persistence.store.js';
export { JsonFilePersistenceStore } from './store/json-file-persistence.store.js';
export type { PersistenceStore } from './store/persistence.types.js';

export { formatDistance } from './utils/format-distance.js';
