import { createContext, useContext, useState, type ReactNode } from 'react';
import { ApiClient } from '../apiClient';
import { config } from '@lib/config';
import { SessionCache } from '@lib/sessionCache';
import { AudioEngine } from '@lib/services/sounds';

export interface AppServices {
  api: ApiClient;
  cache: SessionCache;
  audio: AudioEngine;
}

const ServicesContext = createContext<AppServices | null>(null);

export function createAppServices(overrides: Partial<AppServices> = {}): AppServices {
  return {
    api: overrides.api ?? new ApiClient({ baseUrl: config.apiBaseUrl, timeoutMs: config.apiTimeoutMs }),
    cache: overrides.cache ?? new SessionCache(),
    audio: overrides.audio ?? new AudioEngine(),
  };
}

type Props = { children: ReactNode; services?: Partial<AppServices> };

// Services are created once per mounted provider and never replaced.
export function AppServicesProvider({ children, services }: Props) {
  const [value] = useState<AppServices>(() => createAppServices(services));
  return <ServicesContext.Provider value={value}>{children}</ServicesContext.Provider>;
}

export function useAppServices(): AppServices {
  const ctx = useContext(ServicesContext);
  if (!ctx) throw new Error('useAppServices must be used inside <AppServicesProvider>');
  return ctx;
}

export function useSessionCache(): SessionCache {
  return useAppServices().cache;
}
