// Single-shot device location as a promise.

export type LocationErrorCode = 'unavailable' | 'denied' | 'timeout';

export class LocationError extends Error {
  readonly code: LocationErrorCode;
  constructor(code: LocationErrorCode, message: string) {
    super(message);
    this.name = 'LocationError';
    this.code = code;
  }
}

export interface Coordinates { latitude: number; longitude: number }

// Structural subset of navigator.geolocation
export interface GeolocationLike {
  getCurrentPosition(
    success: (pos: { coords: Coordinates }) => void,
    error: (err: { code: number; message: string }) => void,
    options?: PositionOptions,
  ): void;
}

// GeolocationPositionError codes
const PERMISSION_DENIED = 1;
const TIMEOUT = 3;

export function getCurrentPosition(
  opts: { timeoutMs?: number; geolocation?: GeolocationLike | null } = {},
): Promise<Coordinates> {
  const geo = opts.geolocation !== undefined
    ? opts.geolocation
    : (typeof navigator !== 'undefined' && 'geolocation' in navigator ? navigator.geolocation : null);
  if (!geo) return Promise.reject(new LocationError('unavailable', 'Location services are not available'));
  return new Promise<Coordinates>((resolve, reject) => {
    geo.getCurrentPosition(
      (pos) => resolve({ latitude: pos.coords.latitude, longitude: pos.coords.longitude }),
      (err) => {
        if (err.code === PERMISSION_DENIED) reject(new LocationError('denied', 'Location permission denied'));
        else if (err.code === TIMEOUT) reject(new LocationError('timeout', 'Timed out waiting for location'));
        else reject(new LocationError('unavailable', err.message || 'Location unavailable'));
      },
      { enableHighAccuracy: false, timeout: opts.timeoutMs ?? 10_000, maximumAge: 5 * 60_000 },
    );
  });
}
