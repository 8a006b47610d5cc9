import React from 'react';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { act, renderHook, waitFor } from '@testing-library/react';
import { ApiClient } from '../src/apiClient';
import type { BirthCoordinates } from '../src/apiClient';
import { AppServicesProvider, useAppServices, useSessionCache } from '../src/app/AppServices';
import { useCachedResource } from '../src/app/hooks/useCachedResource';
import { loadDailyReading } from '../src/lib/loaders';
import { CacheKeys, SessionCache } from '../src/lib/sessionCache';

const birth: BirthCoordinates = { datetime: '1995-03-14T09:30:00', latitude: 40.7128, longitude: -74.006, timezone: 'UTC' };

afterEach(() => {
  vi.restoreAllMocks();
});

describe('useCachedResource', () => {
  it('exposes the loaded value', async () => {
    const load = vi.fn(async (_signal: AbortSignal) => 'ready');
    const { result } = renderHook(() => useCachedResource(load));
    expect(result.current.loading).toBe(true);
    await waitFor(() => expect(result.current.loading).toBe(false));
    expect(result.current.data).toBe('ready');
    expect(result.current.error).toBeNull();
  });

  it('keeps a failure until the user retries', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const load = vi.fn(async (_signal: AbortSignal): Promise<string> => { throw new Error('Network down'); });
    const { result } = renderHook(() => useCachedResource(load));
    await waitFor(() => expect(result.current.error).toBe('Network down'));
    expect(result.current.loading).toBe(false);
    expect(result.current.data).toBeNull();
    expect(load).toHaveBeenCalledTimes(1);

    load.mockImplementation(async () => 'second try');
    act(() => result.current.retry());
    await waitFor(() => expect(result.current.data).toBe('second try'));
    expect(result.current.error).toBeNull();
    expect(load).toHaveBeenCalledTimes(2);
  });

  it('aborts the load on unmount and reports nothing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const seen: { signal?: AbortSignal } = {};
    const { unmount } = renderHook(() => useCachedResource((signal) => {
      seen.signal = signal;
      return new Promise<string>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(Object.assign(new Error('aborted'), { name: 'AbortError' })));
      });
    }));
    unmount();
    expect(seen.signal?.aborted).toBe(true);
    await Promise.resolve();
    expect(warn).not.toHaveBeenCalled();
  });
});

describe('AppServicesProvider', () => {
  function jsonFetch(body: unknown) {
    return vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) => new Response(JSON.stringify(body), { status: 200 }));
  }

  it('shares one cache between screens', async () => {
    const fetchMock = jsonFetch({ headline: 'Bright skies', horoscope: 'Go outside.' });
    const api = new ApiClient({ baseUrl: 'http://api.test', fetch: fetchMock });
    const cache = new SessionCache();
    const wrapper = ({ children }: { children: React.ReactNode }) => (
      <AppServicesProvider services={{ api, cache }}>{children}</AppServicesProvider>
    );
    const useReading = () => {
      const services = useAppServices();
      return useCachedResource((signal) => loadDailyReading(services.api, services.cache, birth, signal));
    };

    const first = renderHook(useReading, { wrapper });
    await waitFor(() => expect(first.result.current.data?.headline).toBe('Bright skies'));
    first.unmount();

    const second = renderHook(useReading, { wrapper });
    await waitFor(() => expect(second.result.current.data?.headline).toBe('Bright skies'));
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(cache.has(CacheKeys.dailyReading)).toBe(true);
  });

  it('hands out the provided cache', () => {
    const cache = new SessionCache();
    const wrapper = ({ children }: { children: React.ReactNode }) => (
      <AppServicesProvider services={{ cache }}>{children}</AppServicesProvider>
    );
    const { result, rerender } = renderHook(() => useSessionCache(), { wrapper });
    rerender();
    expect(result.current).toBe(cache);
  });

  it('refuses to work outside the provider', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(() => renderHook(() => useAppServices())).toThrow('useAppServices must be used inside <AppServicesProvider>');
  });
});
