import { describe, it, expect, vi } from 'vitest';
import { getCurrentPosition, LocationError } from '../src/lib/services/location';
import type { GeolocationLike } from '../src/lib/services/location';

function resolvingGeo(latitude: number, longitude: number): GeolocationLike {
  type Success = Parameters<GeolocationLike['getCurrentPosition']>[0];
  return { getCurrentPosition: vi.fn((success: Success) => success({ coords: { latitude, longitude } })) };
}

function failingGeo(code: number, message = ''): GeolocationLike {
  return { getCurrentPosition: (_success, error) => error({ code, message }) };
}

describe('getCurrentPosition', () => {
  it('resolves with coordinates', async () => {
    const geo = resolvingGeo(40.7128, -74.006);
    await expect(getCurrentPosition({ geolocation: geo, timeoutMs: 5_000 })).resolves.toEqual({ latitude: 40.7128, longitude: -74.006 });
    expect(geo.getCurrentPosition).toHaveBeenCalledWith(expect.any(Function), expect.any(Function), {
      enableHighAccuracy: false,
      timeout: 5_000,
      maximumAge: 300_000,
    });
  });

  it('rejects when geolocation is missing', async () => {
    const err = await getCurrentPosition({ geolocation: null }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LocationError);
    expect(err).toMatchObject({ code: 'unavailable', message: 'Location services are not available' });
  });

  it('maps browser error codes', async () => {
    await expect(getCurrentPosition({ geolocation: failingGeo(1) })).rejects.toMatchObject({ code: 'denied' });
    await expect(getCurrentPosition({ geolocation: failingGeo(3) })).rejects.toMatchObject({ code: 'timeout' });
    await expect(getCurrentPosition({ geolocation: failingGeo(2, 'No fix') })).rejects.toMatchObject({
      code: 'unavailable',
      message: 'No fix',
    });
  });
});
