/**
 * Location ports
 * Platform location services are modeled as event sources with closed event sets.
 */

import type { Coordinate, LocationFix } from '../../contracts/assistant.contracts.js';

export type PermissionStatus =
  | 'notDetermined'
  | 'denied'
  | 'restricted'
  | 'authorizedWhenInUse'
  | 'authorizedAlways';

/** Collapsed view used by the resolver */
export type LocationPermission = 'notDetermined' | 'denied' | 'restricted' | 'authorized';

export function toLocationPermission(status: PermissionStatus): LocationPermission {
  switch (status) {
    case 'authorizedWhenInUse':
    case 'authorizedAlways':
      return 'authorized';
    default:
      return status;
  }
}

export function isBlocked(permission: LocationPermission): boolean {
  return permission === 'denied' || permission === 'restricted';
}

export type Unsubscribe = () => void;

export interface LocationPermissionProvider {
  requestPermission(): Promise<PermissionStatus>;
  currentStatus(): PermissionStatus;
  subscribe(listener: (status: PermissionStatus) => void): Unsubscribe;
}

export type LocationEvent =
  | { type: 'fix'; fix: LocationFix }
  | { type: 'error'; error: Error };

export interface LocationProvider {
  startUpdates(): void;
  requestOnce(): void;
  stopUpdates(): void;
  subscribe(listener: (event: LocationEvent) => void): Unsubscribe;
}

export interface Placemark {
  subLocality?: string | undefined;
  locality?: string | undefined;
}

export interface ReverseGeocodeProvider {
  resolve(coordinate: Coordinate): Promise<Placemark>;
}

export class GeocodeError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'GeocodeError';
  }
}

export const DEFAULT_PLACE_NAME = 'Current Location';
