/**
 * LocationResolver
 * Acquires and maintains the device location fix.
 *
 * - Authorized: continuous updates plus one immediate one-shot request
 * - Each fix replaces the previous one and halts the retry schedule
 * - One reverse-geocode lookup at a time; fixes arriving meanwhile don't queue another
 * - Denied/Restricted: retries stop for good and permissionBlocked$ fires once
 */

import { BehaviorSubject, Subject, type Observable } from 'rxjs';
import type { Coordinate, LocationFix } from '../../contracts/assistant.contracts.js';
import { haversineMeters } from '../../lib/geo/distance-calculator.js';
import { componentLogger } from '../../lib/logger/structured-logger.js';
import { systemScheduler, type Scheduler } from '../../lib/reliability/scheduler.js';
import { LocationRetryScheduler, type RetryPolicy, type RetrySchedule } from './location-retry.schedule.js';
import {
  DEFAULT_PLACE_NAME,
  GeocodeError,
  isBlocked,
  toLocationPermission,
  type LocationEvent,
  type LocationPermission,
  type LocationPermissionProvider,
  type LocationProvider,
  type PermissionStatus,
  type ReverseGeocodeProvider,
  type Unsubscribe
} from './location.types.js';

const log = componentLogger('LocationResolver');

export interface LocationResolverDeps {
  permissions: LocationPermissionProvider;
  locations: LocationProvider;
  geocoder: ReverseGeocodeProvider;
  scheduler?: Scheduler;
  retryPolicy?: RetryPolicy;
}

export class LocationResolver {
  private readonly _fix = new BehaviorSubject<LocationFix | undefined>(undefined);
  private readonly _placeName = new BehaviorSubject<string>(DEFAULT_PLACE_NAME);
  private readonly _permission: BehaviorSubject<LocationPermission>;
  private readonly _permissionBlocked = new Subject<LocationPermission>();

  readonly fix$: Observable<LocationFix | undefined> = this._fix.asObservable();
  readonly placeName$: Observable<string> = this._placeName.asObservable();
  readonly permission$: Observable<LocationPermission>;
  /** Fires at most once per resolver lifetime */
  readonly permissionBlocked$: Observable<LocationPermission> = this._permissionBlocked.asObservable();

  private readonly retry: LocationRetryScheduler;
  private subscriptions: Unsubscribe[] = [];
  private permissionRequest: Promise<LocationPermission> | null = null;
  private geocodePending = false;
  private blockedSignalRaised = false;
  private started = false;

  constructor(private readonly deps: LocationResolverDeps) {
    this._permission = new BehaviorSubject(toLocationPermission(deps.permissions.currentStatus()));
    this.permission$ = this._permission.asObservable();
    this.retry = new LocationRetryScheduler(
      deps.scheduler ?? systemScheduler,
      (attempt) => this.retryAttempt(attempt),
      deps.retryPolicy
    );
  }

  get currentFix(): LocationFix | undefined {
    return this._fix.getValue();
  }

  get permission(): LocationPermission {
    return this._permission.getValue();
  }

  get placeName(): string {
    return this._placeName.getValue();
  }

  get retrySchedule(): Readonly<RetrySchedule> | null {
    return this.retry.state;
  }

  /**
   * Subscribe to providers, ask for permission and arm the retry schedule
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.subscriptions.push(
      this.deps.permissions.subscribe((status) => this.handlePermissionStatus(status)),
      this.deps.locations.subscribe((event) => this.handleLocationEvent(event))
    );

    const permission = this.permission;
    log.info({ permission }, '[LocationResolver] starting');

    if (isBlocked(permission)) {
      this.raiseBlocked(permission);
      return;
    }

    if (permission === 'authorized') {
      this.beginUpdates();
    } else {
      this.requestPermission().catch((err: unknown) => {
        log.warn({ err }, '[LocationResolver] initial permission request failed');
      });
    }

    if (!this.currentFix) {
      this.retry.start();
    }
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;
    this.retry.halt('stopped');
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
    this.deps.locations.stopUpdates();
    log.info('[LocationResolver] stopped');
  }

  /**
   * Idempotent: concurrent calls share one provider request, and nothing is
   * asked once the status is determined.
   */
  requestPermission(): Promise<LocationPermission> {
    if (this.permission !== 'notDetermined') {
      return Promise.resolve(this.permission);
    }
    if (this.permissionRequest) {
      return this.permissionRequest;
    }

    log.info('[LocationResolver] requesting permission');
    this.permissionRequest = this.deps.permissions
      .requestPermission()
      .then((status) => {
        this.handlePermissionStatus(status);
        return this.permission;
      })
      .finally(() => {
        this.permissionRequest = null;
      });

    return this.permissionRequest;
  }

  /**
   * Great-circle distance in meters from the current fix
   */
  distanceTo(coordinate: Coordinate): number | undefined {
    const fix = this.currentFix;
    return fix ? haversineMeters(fix, coordinate) : undefined;
  }

  private handlePermissionStatus(status: PermissionStatus): void {
    const next = toLocationPermission(status);
    const previous = this.permission;
    if (next === previous) return;

    this._permission.next(next);
    log.info({ from: previous, to: next }, '[LocationResolver] permission changed');

    if (next === 'authorized') {
      this.beginUpdates();
    } else if (isBlocked(next)) {
      this.retry.halt('permission_blocked');
      this.raiseBlocked(next);
    }
  }

  private handleLocationEvent(event: LocationEvent): void {
    switch (event.type) {
      case 'fix': {
        this._fix.next(event.fix);
        this.retry.halt('fix_obtained');
        log.debug({ accuracy: event.fix.accuracy }, '[LocationResolver] fix updated');
        this.resolvePlaceName(event.fix);
        return;
      }
      case 'error':
        // Provider keeps running; the retry schedule covers the gap
        log.warn({ err: event.error }, '[LocationResolver] location provider error');
        return;
    }
  }

  private retryAttempt(attempt: number): void {
    if (this.currentFix) {
      this.retry.halt('fix_obtained');
      return;
    }

    const permission = toLocationPermission(this.deps.permissions.currentStatus());
    log.info({ attempt, permission }, '[LocationResolver] retrying location');

    if (permission !== this.permission) {
      // Transition handlers start updates or halt as appropriate
      this.handlePermissionStatus(this.deps.permissions.currentStatus());
      if (permission !== 'notDetermined') return;
    }

    switch (permission) {
      case 'authorized':
        this.beginUpdates();
        return;
      case 'notDetermined':
        this.requestPermission().catch((err: unknown) => {
          log.warn({ err, attempt }, '[LocationResolver] permission request failed');
        });
        return;
      case 'denied':
      case 'restricted':
        this.retry.halt('permission_blocked');
        this.raiseBlocked(permission);
        return;
    }
  }

  private beginUpdates(): void {
    this.deps.locations.startUpdates();
    this.deps.locations.requestOnce();
  }

  private raiseBlocked(permission: LocationPermission): void {
    if (this.blockedSignalRaised) return;
    this.blockedSignalRaised = true;
    log.warn({ permission }, '[LocationResolver] location permission blocked');
    this._permissionBlocked.next(permission);
  }

  private resolvePlaceName(fix: LocationFix): void {
    if (this.geocodePending) return;
    this.geocodePending = true;

    void this.deps.geocoder
      .resolve({ latitude: fix.latitude, longitude: fix.longitude })
      .then((placemark) => {
        this._placeName.next(placemark.subLocality || placemark.locality || DEFAULT_PLACE_NAME);
      })
      .catch((err: unknown) => {
        // Place name keeps its previous value
        const error = err instanceof GeocodeError ? err : new GeocodeError('Reverse geocode failed', err);
        log.debug({ err: error }, '[LocationResolver] reverse geocode failed');
      })
      .finally(() => {
        this.geocodePending = false;
      });
  }
}
