import { z } from 'zod';
import { config } from './lib/config';
import { isAbortError } from './lib/loaders';
import type { BirthData, FriendProfile } from './lib/types';
import {
  AlignmentResultSchema,
  ChartSonificationSchema,
  CompatibilityResultSchema,
  DailyReadingSchema,
  FriendAlignmentResultSchema,
  LocationSchema,
  NatalChartSchema,
  PlaylistInsightSchema,
  PlaylistResultSchema,
  SpotifyAuthUrlSchema,
  SpotifyStatusSchema,
  TransitsResultSchema,
  ZodiacSeasonCardSchema,
} from './lib/schemas';
import type {
  AlignmentResult,
  ChartSonification,
  CompatibilityResult,
  DailyReading,
  FriendAlignmentResult,
  Location,
  NatalChart,
  PlaylistInsight,
  PlaylistResult,
  SpotifyAuthUrl,
  SpotifyStatus,
  TransitsResult,
  ZodiacSeasonCard,
} from './lib/schemas';

/** Failure at the backend boundary. `status` is 0 for network errors and timeouts. */
export class ApiError extends Error {
  readonly status: number;
  constructor(message: string, status: number) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
  }
}

export type BirthCoordinates = Pick<BirthData, 'datetime' | 'latitude' | 'longitude' | 'timezone'>;

/** What the playlist insight is asked to explain. */
export interface PlaylistInsightRequest {
  energyPercent: number;
  dominantMood: string;
  dominantElement: string;
  bpmMin: number;
  bpmMax: number;
}

export interface ApiClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

interface RequestOptions {
  body?: unknown;
  query?: Record<string, string>;
  signal?: AbortSignal;
}

const HealthSchema = z.object({ status: z.string() });

function detailOf(data: unknown): string | null {
  if (!data || typeof data !== 'object' || !('detail' in data)) return null;
  const detail = data.detail;
  return typeof detail === 'string' && detail ? detail : null;
}

function birthBody(b: BirthCoordinates) {
  return { datetime: b.datetime, latitude: b.latitude, longitude: b.longitude, timezone: b.timezone || 'UTC' };
}

export function friendBirthData(f: FriendProfile): BirthCoordinates | null {
  if (f.birthDatetime == null || f.birthLatitude == null || f.birthLongitude == null || f.birthTimezone == null) return null;
  return { datetime: f.birthDatetime, latitude: f.birthLatitude, longitude: f.birthLongitude, timezone: f.birthTimezone };
}

export class ApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(opts: ApiClientOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? config.apiBaseUrl).replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? config.apiTimeoutMs;
    // global fetch must not be invoked with the client as `this`
    this.fetchFn = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  private url(path: string, query?: Record<string, string>): string {
    const qs = query ? '?' + new URLSearchParams(query).toString() : '';
    return `${this.baseUrl}${path}${qs}`;
  }

  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    path: string,
    schema: S,
    opts: RequestOptions = {},
  ): Promise<z.output<S>> {
    const ctrl = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => { timedOut = true; ctrl.abort(); }, this.timeoutMs);
    const outer = opts.signal;
    const forwardAbort = () => ctrl.abort();
    if (outer) {
      if (outer.aborted) ctrl.abort();
      else outer.addEventListener('abort', forwardAbort, { once: true });
    }
    try {
      let res: Response;
      try {
        res = await this.fetchFn(this.url(path, opts.query), {
          method,
          headers: opts.body === undefined ? undefined : { 'Content-Type': 'application/json' },
          body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
          signal: ctrl.signal,
        });
      } catch (e) {
        if (timedOut) throw new ApiError(`Request timed out after ${this.timeoutMs}ms`, 0);
        if (outer?.aborted) throw e; // cancelled by the caller, not a failure
        throw new ApiError(e instanceof Error ? e.message : 'Network error', 0);
      }
      // the timer and the caller's signal still apply while the body streams in
      let data: unknown = null;
      try {
        data = await res.json();
      } catch (e) {
        if (timedOut) throw new ApiError(`Request timed out after ${this.timeoutMs}ms`, 0);
        if (outer?.aborted) throw isAbortError(e) ? e : new DOMException('The operation was aborted.', 'AbortError');
        // otherwise a non-JSON body, which reads as null
      }
      if (!res.ok) {
        throw new ApiError(detailOf(data) ?? `Request to ${path} failed (${res.status})`, res.status);
      }
      const parsed = schema.safeParse(data);
      if (!parsed.success) {
        console.warn('[api] unexpected payload', path, parsed.error.issues);
        throw new ApiError(`Unexpected response from ${path}`, res.status);
      }
      return parsed.data;
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener('abort', forwardAbort);
    }
  }

  async checkHealth(signal?: AbortSignal): Promise<boolean> {
    try {
      const data = await this.request('GET', '/health', HealthSchema, { signal });
      return data.status === 'healthy';
    } catch (e) {
      console.warn('[api] health check failed', e instanceof Error ? e.message : e);
      return false;
    }
  }

  /** Geocode a place name. Queries shorter than two characters return no results without a request. */
  async searchLocations(query: string, limit = 5, signal?: AbortSignal): Promise<Location[]> {
    if (query.trim().length < 2) return [];
    return this.request('GET', '/api/geocode/search', z.array(LocationSchema), {
      query: { query: query.trim(), limit: String(limit) },
      signal,
    });
  }

  getNatalChart(birth: BirthCoordinates, signal?: AbortSignal): Promise<NatalChart> {
    return this.request('POST', '/api/charts/natal', NatalChartSchema, { body: birthBody(birth), signal });
  }

  getUserSonification(birth: BirthCoordinates, signal?: AbortSignal): Promise<ChartSonification> {
    return this.request('POST', '/api/sonification/user', ChartSonificationSchema, { body: birthBody(birth), signal });
  }

  getDailySonification(at: { latitude: number; longitude: number }, signal?: AbortSignal): Promise<ChartSonification> {
    return this.request('GET', '/api/sonification/daily', ChartSonificationSchema, {
      query: { latitude: String(at.latitude), longitude: String(at.longitude) },
      signal,
    });
  }

  /** `subjectName` switches the reading to third person (a friend's horoscope). */
  getDailyReading(birth: BirthCoordinates, subjectName?: string, signal?: AbortSignal): Promise<DailyReading> {
    const body = subjectName ? { ...birthBody(birth), subject_name: subjectName } : birthBody(birth);
    return this.request('POST', '/api/ai/daily-reading', DailyReadingSchema, { body, signal });
  }

  getCompatibility(
    user: BirthCoordinates,
    friend: BirthCoordinates & { name?: string },
    signal?: AbortSignal,
  ): Promise<CompatibilityResult> {
    const body: Record<string, unknown> = {
      user_datetime: user.datetime,
      user_latitude: user.latitude,
      user_longitude: user.longitude,
      friend_datetime: friend.datetime,
      friend_latitude: friend.latitude,
      friend_longitude: friend.longitude,
    };
    if (friend.name) body.friend_name = friend.name;
    return this.request('POST', '/api/ai/compatibility', CompatibilityResultSchema, { body, signal });
  }

  /** Today's transits against the natal chart. */
  getDailyAlignment(birth: BirthCoordinates, signal?: AbortSignal): Promise<AlignmentResult> {
    return this.request('POST', '/api/alignment/daily', AlignmentResultSchema, { body: birthBody(birth), signal });
  }

  getFriendAlignment(user: BirthCoordinates, friend: BirthCoordinates, signal?: AbortSignal): Promise<FriendAlignmentResult> {
    return this.request('POST', '/api/alignment/friend', FriendAlignmentResultSchema, {
      body: {
        user_datetime: user.datetime,
        user_latitude: user.latitude,
        user_longitude: user.longitude,
        user_timezone: user.timezone || 'UTC',
        friend_datetime: friend.datetime,
        friend_latitude: friend.latitude,
        friend_longitude: friend.longitude,
        friend_timezone: friend.timezone || 'UTC',
      },
      signal,
    });
  }

  getTransits(signal?: AbortSignal): Promise<TransitsResult> {
    return this.request('GET', '/api/alignment/transits', TransitsResultSchema, { signal });
  }

  getPlaylistInsight(birth: BirthCoordinates, req: PlaylistInsightRequest, signal?: AbortSignal): Promise<PlaylistInsight> {
    return this.request('POST', '/api/ai/playlist-insight', PlaylistInsightSchema, {
      body: {
        datetime: birth.datetime,
        latitude: birth.latitude,
        longitude: birth.longitude,
        energy_percent: req.energyPercent,
        dominant_mood: req.dominantMood,
        dominant_element: req.dominantElement,
        bpm_min: req.bpmMin,
        bpm_max: req.bpmMax,
      },
      signal,
    });
  }

  getZodiacSeasonCard(birth: BirthCoordinates, genres: string[], signal?: AbortSignal): Promise<ZodiacSeasonCard> {
    return this.request('POST', '/api/cosmic/zodiac-season', ZodiacSeasonCardSchema, {
      body: { ...birthBody(birth), genre_preferences: genres },
      signal,
    });
  }

  generatePlaylist(birth: BirthCoordinates, playlistSize = 20, signal?: AbortSignal): Promise<PlaylistResult> {
    return this.request('POST', '/api/playlist/generate', PlaylistResultSchema, {
      body: {
        birth_datetime: birth.datetime,
        latitude: birth.latitude,
        longitude: birth.longitude,
        timezone: birth.timezone || 'UTC',
        playlist_size: playlistSize,
      },
      signal,
    });
  }

  getSpotifyAuthUrl(signal?: AbortSignal): Promise<SpotifyAuthUrl> {
    return this.request('GET', '/api/spotify/auth-url', SpotifyAuthUrlSchema, { signal });
  }

  /** Connection status; any failure reads as not connected. */
  async getSpotifyStatus(sessionId: string | null, signal?: AbortSignal): Promise<SpotifyStatus> {
    try {
      return await this.request('GET', '/api/spotify/status', SpotifyStatusSchema, {
        query: sessionId ? { session_id: sessionId } : undefined,
        signal,
      });
    } catch (e) {
      if (signal?.aborted) throw e;
      console.warn('[api] spotify status failed', e instanceof Error ? e.message : e);
      return { connected: false, userId: null, displayName: null, product: null };
    }
  }
}
