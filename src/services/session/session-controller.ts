/**
 * SessionController
 * Top-level orchestrator for one assistant session.
 *
 * Text and finalized voice transcripts flow through submitUserText(), get
 * augmented with the latest location fix, go to the ConversationClient and
 * come back through the EntityExtractor as exactly one assistant message.
 */

import { BehaviorSubject, Subject, Subscription, filter, type Observable } from 'rxjs';
import type {
  ChatMessage,
  LocationFix,
  RestaurantRecord,
  SortOption
} from '../../contracts/assistant.contracts.js';
import { haversineMeters } from '../../lib/geo/distance-calculator.js';
import { componentLogger } from '../../lib/logger/structured-logger.js';
import { mathRandom, type RandomSource } from '../../lib/random/random-source.js';
import type { ChatGenerationConfig } from '../../llm/types.js';
import type { AssistantDataStore } from '../../store/assistant-data.store.js';
import type { ConversationClient, SendOutcome } from '../conversation/conversation-client.js';
import { ConversationBusyError, fallbackMessageFor, type ConversationError } from '../conversation/conversation.errors.js';
import { extractRestaurants } from '../extraction/entity-extractor.js';
import type { LocationResolver } from '../location/location-resolver.js';
import { isBlocked, type LocationPermission } from '../location/location.types.js';
import type { SpeechCaptureService } from '../speech/speech-capture.service.js';
import type { StartListeningResult } from '../speech/speech.types.js';
import { assistantReply, errorMessage, userMessage, welcomeMessage } from './message.factory.js';
import { filterRestaurants, sortRestaurants, type RestaurantFilterCriteria } from './restaurant-filter.js';
import { AVAILABLE_CUISINES, suggestedQueries } from './suggestions.js';

const log = componentLogger('SessionController');

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected';

export type SubmitRejection = 'not_connected' | 'empty' | 'busy';

export type SubmitOutcome =
  | { status: 'rejected'; reason: SubmitRejection }
  | { status: 'answered'; message: ChatMessage }
  | { status: 'failed'; message: ChatMessage; error: ConversationError }
  | { status: 'discarded' };

export interface SessionControllerDeps {
  store: AssistantDataStore;
  conversation: ConversationClient;
  location: LocationResolver;
  speech?: SpeechCaptureService;
  generation: ChatGenerationConfig;
  random?: RandomSource;
}

export function buildLocationPrompt(text: string, fix: LocationFix | undefined): string {
  if (fix) {
    return `Please find restaurants at these exact coordinates: ${fix.latitude}, ${fix.longitude}. The user is asking: ${text}`;
  }
  return `I am looking for restaurants nearby. ${text}`;
}

function withDistanceFrom(fix: LocationFix) {
  return (record: RestaurantRecord): RestaurantRecord => ({
    ...record,
    distanceMeters: haversineMeters(fix, record.coordinates)
  });
}

export class SessionController {
  private readonly _status = new BehaviorSubject<ConnectionStatus>('disconnected');
  private readonly _processing = new BehaviorSubject<boolean>(false);
  private readonly _displayed = new BehaviorSubject<readonly RestaurantRecord[]>([]);
  private readonly _locationRequests = new Subject<LocationPermission>();

  readonly status$: Observable<ConnectionStatus> = this._status.asObservable();
  readonly processing$: Observable<boolean> = this._processing.asObservable();
  readonly displayedRestaurants$: Observable<readonly RestaurantRecord[]> = this._displayed.asObservable();
  /** Raised when a query goes out without a fix because location access is blocked */
  readonly locationRequests$: Observable<LocationPermission> = this._locationRequests.asObservable();
  readonly messages$: Observable<readonly ChatMessage[]>;

  private results: RestaurantRecord[] = [];
  private criteria: RestaurantFilterCriteria = {};
  private readonly random: RandomSource;
  private readonly subscriptions = new Subscription();

  constructor(private readonly deps: SessionControllerDeps) {
    this.random = deps.random ?? mathRandom;
    this.messages$ = deps.store.history$;

    this.subscriptions.add(
      deps.location.fix$
        .pipe(filter((fix): fix is LocationFix => fix !== undefined))
        .subscribe((fix) => this.applyFix(fix))
    );

    const speech = deps.speech;
    if (speech) {
      this.subscriptions.add(
        speech.finalTranscripts$.subscribe((transcript) => {
          this.submitUserText(transcript)
            .then((outcome) => {
              if (outcome.status === 'rejected') {
                log.info({ reason: outcome.reason }, '[SessionController] voice transcript rejected');
              }
            })
            .catch((err: unknown) => {
              log.error({ err }, '[SessionController] voice transcript submission failed');
            });
        })
      );
    }
  }

  get status(): ConnectionStatus {
    return this._status.getValue();
  }

  get isProcessing(): boolean {
    return this._processing.getValue();
  }

  get messages(): readonly ChatMessage[] {
    return this.deps.store.history;
  }

  get displayedRestaurants(): readonly RestaurantRecord[] {
    return this._displayed.getValue();
  }

  /**
   * Resolves true once connected. Initialization failures land back in
   * disconnected and resolve false.
   */
  async connect(): Promise<boolean> {
    if (this.status !== 'disconnected') {
      return this.status === 'connected';
    }
    this._status.next('connecting');
    log.info({ model: this.deps.generation.model }, '[SessionController] connecting');

    let started: boolean;
    try {
      started = await this.deps.conversation.startSession(this.deps.generation);
    } catch (err) {
      log.error({ err }, '[SessionController] connection failed');
      if (this._status.getValue() === 'connecting') this._status.next('disconnected');
      return false;
    }

    // disconnect() ran while the session was starting
    if (!started || this._status.getValue() !== 'connecting') {
      return false;
    }

    this._status.next('connected');
    if (this.deps.store.history.length === 0) {
      this.deps.store.appendMessage(welcomeMessage());
    }
    log.info('[SessionController] connected');
    return true;
  }

  disconnect(): void {
    this.deps.speech?.cancel();
    this.deps.conversation.endSession();
    this._processing.next(false);
    if (this.status !== 'disconnected') {
      this._status.next('disconnected');
      log.info('[SessionController] disconnected');
    }
  }

  async submitUserText(text: string): Promise<SubmitOutcome> {
    const query = text.trim();
    if (this.status !== 'connected') return this.reject('not_connected');
    if (!query) return this.reject('empty');
    if (this.isProcessing) return this.reject('busy');

    this.deps.store.addRecentSearch(query);
    this.deps.store.appendMessage(userMessage(query));
    this._processing.next(true);

    const fix = this.deps.location.currentFix;
    if (!fix) {
      const permission = this.deps.location.permission;
      if (isBlocked(permission)) {
        this._locationRequests.next(permission);
      }
    }

    let outcome: SendOutcome;
    try {
      outcome = await this.deps.conversation.send(buildLocationPrompt(query, fix));
    } catch (err) {
      this._processing.next(false);
      if (err instanceof ConversationBusyError) return this.reject('busy');
      throw err;
    }

    return this.applyOutcome(outcome);
  }

  startListening(): Promise<StartListeningResult> {
    const speech = this.deps.speech;
    if (!speech) return Promise.resolve('unavailable');
    return speech.startListening();
  }

  stopListening(): boolean {
    return this.deps.speech?.stopListening() ?? false;
  }

  clearHistory(): void {
    this.deps.store.clearHistory();
    this.results = [];
    this.refreshDisplayed();
  }

  toggleFavorite(record: RestaurantRecord): boolean {
    return this.deps.store.toggleFavorite(record);
  }

  isFavorite(record: RestaurantRecord): boolean {
    return this.deps.store.isFavorite(record.id);
  }

  suggestedQueries(): string[] {
    return suggestedQueries(this.deps.store.recentSearches);
  }

  availableCuisines(): readonly string[] {
    return AVAILABLE_CUISINES;
  }

  /**
   * Narrow the displayed set. Criteria replace the previous ones.
   */
  filterRestaurants(criteria: RestaurantFilterCriteria): readonly RestaurantRecord[] {
    this.criteria = { ...criteria };
    this.refreshDisplayed();
    return this.displayedRestaurants;
  }

  setSortOption(option: SortOption): void {
    this.deps.store.setSortPreference(option);
    this.refreshDisplayed();
  }

  /**
   * Release subscriptions and end the session
   */
  dispose(): void {
    this.subscriptions.unsubscribe();
    this.disconnect();
  }

  private applyOutcome(outcome: SendOutcome): SubmitOutcome {
    switch (outcome.status) {
      case 'stale':
        log.info({ sessionToken: outcome.sessionToken }, '[SessionController] late response ignored');
        return { status: 'discarded' };

      case 'error': {
        const message = errorMessage(fallbackMessageFor(outcome.error));
        this.deps.store.appendMessage(message);
        this._processing.next(false);
        log.warn({ kind: outcome.error.kind }, '[SessionController] request failed');
        return { status: 'failed', message, error: outcome.error };
      }

      case 'ok': {
        const { entities, passthroughText } = extractRestaurants(
          outcome.text,
          this.deps.location.currentFix,
          this.random
        );
        const message = assistantReply(passthroughText, entities);
        this.deps.store.appendMessage(message);
        if (entities.length > 0) {
          this.results = entities;
          this.refreshDisplayed();
        }
        this._processing.next(false);
        log.info({ entities: entities.length }, '[SessionController] response applied');
        return { status: 'answered', message };
      }
    }
  }

  private applyFix(fix: LocationFix): void {
    const measure = withDistanceFrom(fix);

    if (this.deps.store.history.some(m => m.entities.length > 0)) {
      this.deps.store.updateMessages((message) =>
        message.entities.length === 0
          ? message
          : Object.freeze({ ...message, entities: message.entities.map(measure) })
      );
    }

    if (this.results.length > 0) {
      this.results = this.results.map(measure);
      this.refreshDisplayed();
    }
  }

  private refreshDisplayed(): void {
    const filtered = filterRestaurants(this.results, this.criteria);
    this._displayed.next(sortRestaurants(filtered, this.deps.store.preferences.sortPreference));
  }

  private reject(reason: SubmitRejection): SubmitOutcome {
    log.debug({ reason }, '[SessionController] submission rejected');
    return { status: 'rejected', reason };
  }
}
