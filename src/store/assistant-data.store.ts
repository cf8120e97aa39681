/**
 * Assistant Data Store
 * Single writer for chat history, preferences and favorites.
 *
 * Every mutation publishes a new snapshot and writes through to the
 * PersistenceStore. Saves are serialized so the last write always wins.
 */

import { BehaviorSubject, type Observable } from 'rxjs';
import {
  DEFAULT_PREFERENCES,
  PersistedStateSchema,
  STATE_VERSION,
  type ChatMessage,
  type PersistedState,
  type RestaurantRecord,
  type SortOption,
  type UserPreferences
} from '../contracts/assistant.contracts.js';
import { componentLogger } from '../lib/logger/structured-logger.js';
import type { PersistenceStore } from './persistence.types.js';

const log = componentLogger('AssistantDataStore');

/** Only the tail of a stored conversation is restored */
export const MAX_RESTORED_MESSAGES = 50;
export const DEFAULT_MAX_RECENT_SEARCHES = 10;

export interface AssistantDataStoreOptions {
  maxRecentSearches?: number;
}

export class AssistantDataStore {
  private readonly _history = new BehaviorSubject<readonly ChatMessage[]>([]);
  private readonly _preferences = new BehaviorSubject<UserPreferences>(DEFAULT_PREFERENCES);
  private readonly _favorites = new BehaviorSubject<readonly RestaurantRecord[]>([]);

  readonly history$: Observable<readonly ChatMessage[]> = this._history.asObservable();
  readonly preferences$: Observable<UserPreferences> = this._preferences.asObservable();
  readonly favorites$: Observable<readonly RestaurantRecord[]> = this._favorites.asObservable();

  private saveChain: Promise<void> = Promise.resolve();
  private readonly maxRecentSearches: number;

  constructor(
    private readonly persistence: PersistenceStore,
    options: AssistantDataStoreOptions = {}
  ) {
    this.maxRecentSearches = options.maxRecentSearches ?? DEFAULT_MAX_RECENT_SEARCHES;
  }

  get history(): readonly ChatMessage[] {
    return this._history.getValue();
  }

  get preferences(): UserPreferences {
    return this._preferences.getValue();
  }

  get favorites(): readonly RestaurantRecord[] {
    return this._favorites.getValue();
  }

  get recentSearches(): readonly string[] {
    return this.preferences.recentSearches;
  }

  /**
   * Rehydrate from the persistence store. A missing, unreadable or invalid
   * blob leaves the defaults in place.
   */
  async load(): Promise<void> {
    let blob: string | undefined;
    try {
      blob = await this.persistence.loadState();
    } catch (err) {
      log.error({ err }, '[AssistantDataStore] failed to read persisted state');
      return;
    }
    if (blob === undefined) return;

    let raw: unknown;
    try {
      raw = JSON.parse(blob);
    } catch (err) {
      log.warn({ err }, '[AssistantDataStore] persisted state is not valid JSON, using defaults');
      return;
    }

    const parsed = PersistedStateSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues.length }, '[AssistantDataStore] persisted state failed validation, using defaults');
      return;
    }

    const state = parsed.data;
    this._history.next(state.chatHistory.slice(-MAX_RESTORED_MESSAGES));
    this._preferences.next(state.preferences);
    this._favorites.next(state.favorites);
    log.info({
      messages: this.history.length,
      favorites: state.favorites.length
    }, '[AssistantDataStore] state restored');
  }

  appendMessage(message: ChatMessage): void {
    this._history.next([...this.history, message]);
    this.persist();
  }

  /**
   * Rewrite messages in place. Ids and order must be preserved; used to
   * refresh derived fields such as entity distances.
   */
  updateMessages(update: (message: ChatMessage) => ChatMessage): void {
    const current = this.history;
    const next = current.map(update);
    if (next.some((message, index) => message.id !== current[index]?.id)) {
      throw new Error('updateMessages must preserve message ids and order');
    }
    this._history.next(next);
    this.persist();
  }

  clearHistory(): void {
    this._history.next([]);
    this.persist();
  }

  /**
   * Returns true when the restaurant is a favorite after the call
   */
  toggleFavorite(restaurant: RestaurantRecord): boolean {
    const favorites = this.favorites;
    const prefs = this.preferences;
    const exists = favorites.some(r => r.id === restaurant.id);

    if (exists) {
      this._favorites.next(favorites.filter(r => r.id !== restaurant.id));
      this._preferences.next({
        ...prefs,
        favoriteRestaurantIds: prefs.favoriteRestaurantIds.filter(id => id !== restaurant.id)
      });
    } else {
      this._favorites.next([...favorites, restaurant]);
      this._preferences.next({
        ...prefs,
        favoriteRestaurantIds: [...prefs.favoriteRestaurantIds, restaurant.id]
      });
    }

    this.persist();
    return !exists;
  }

  isFavorite(restaurantId: string): boolean {
    return this.favorites.some(r => r.id === restaurantId);
  }

  /**
   * Most recent first, de-duplicated, capped
   */
  addRecentSearch(search: string): void {
    const query = search.trim();
    if (!query) return;

    const prefs = this.preferences;
    const recentSearches = [query, ...prefs.recentSearches.filter(s => s !== query)].slice(0, this.maxRecentSearches);
    this._preferences.next({ ...prefs, recentSearches });
    this.persist();
  }

  setSortPreference(sortPreference: SortOption): void {
    this._preferences.next({ ...this.preferences, sortPreference });
    this.persist();
  }

  /**
   * Resolves once every write issued so far has settled
   */
  flush(): Promise<void> {
    return this.saveChain;
  }

  private snapshot(): PersistedState {
    return {
      version: STATE_VERSION,
      chatHistory: [...this.history],
      preferences: this.preferences,
      favorites: [...this.favorites]
    };
  }

  private persist(): void {
    const blob = JSON.stringify(this.snapshot());
    this.saveChain = this.saveChain
      .then(() => this.persistence.saveState(blob))
      .catch((err: unknown) => {
        log.error({ err }, '[AssistantDataStore] failed to persist state');
      });
  }
}
