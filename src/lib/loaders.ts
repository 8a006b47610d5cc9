// Screen data loaders: consult the session cache, fetch what is missing, store the result.
// Each takes the screen's AbortSignal; a result that arrives after the signal fired is dropped.
import type { ApiClient, BirthCoordinates, PlaylistInsightRequest } from '../apiClient';
import type {
  AlignmentResult,
  ChartSonification,
  DailyReading,
  FriendAlignmentResult,
  PlaylistInsight,
  PlaylistResult,
  ZodiacSeasonCard,
} from './schemas';
import { CacheKeys } from './sessionCache';
import type { SessionCache } from './sessionCache';

export type ContentApi = Pick<
  ApiClient,
  | 'getUserSonification'
  | 'getDailySonification'
  | 'getDailyReading'
  | 'getZodiacSeasonCard'
  | 'getDailyAlignment'
  | 'getFriendAlignment'
  | 'getPlaylistInsight'
>;

export const DEFAULT_GENRES: readonly string[] = ['indie rock', 'electronic', 'pop'];

export interface Sonifications {
  user: ChartSonification;
  daily: ChartSonification;
}

function abortError(): DOMException {
  return new DOMException('The operation was aborted.', 'AbortError');
}

function ensureLive(signal?: AbortSignal) {
  if (signal?.aborted) throw abortError();
}

export function isAbortError(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'name' in e && e.name === 'AbortError';
}

/** True while a payload's own expiry lies in the future. */
export function isFresh(payload: { cachedUntil: number }, now: number = Date.now()): boolean {
  return now < payload.cachedUntil;
}

export async function loadSonifications(
  api: ContentApi,
  cache: SessionCache,
  birth: BirthCoordinates,
  signal?: AbortSignal,
): Promise<Sonifications> {
  if (cache.userSonification && cache.dailySonification) {
    return { user: cache.userSonification, daily: cache.dailySonification };
  }
  // both requests go out together; completion order does not matter
  const [user, daily] = await Promise.all([
    api.getUserSonification(birth, signal),
    api.getDailySonification({ latitude: birth.latitude, longitude: birth.longitude }, signal),
  ]);
  ensureLive(signal);
  cache.userSonification = user;
  cache.dailySonification = daily;
  return { user, daily };
}

export async function loadDailyReading(
  api: ContentApi,
  cache: SessionCache,
  birth: BirthCoordinates,
  signal?: AbortSignal,
): Promise<DailyReading> {
  const cached = cache.get<DailyReading>(CacheKeys.dailyReading);
  if (cached) return cached;
  const reading = await api.getDailyReading(birth, undefined, signal);
  ensureLive(signal);
  cache.set(CacheKeys.dailyReading, reading);
  return reading;
}

export async function loadZodiacSeasonCard(
  api: ContentApi,
  cache: SessionCache,
  birth: BirthCoordinates,
  genres: readonly string[],
  signal?: AbortSignal,
  now: number = Date.now(),
): Promise<ZodiacSeasonCard> {
  const cached = cache.get<ZodiacSeasonCard>(CacheKeys.zodiacSeasonCard);
  if (cached && isFresh(cached, now)) return cached;
  if (cached) console.log('[loader] season card expired', { seasonKey: cached.seasonKey });
  const card = await api.getZodiacSeasonCard(birth, genres.length ? [...genres] : [...DEFAULT_GENRES], signal);
  ensureLive(signal);
  cache.set(CacheKeys.zodiacSeasonCard, card);
  return card;
}

export async function loadDailyAlignment(
  api: ContentApi,
  cache: SessionCache,
  birth: BirthCoordinates,
  signal?: AbortSignal,
): Promise<AlignmentResult> {
  const cached = cache.get<AlignmentResult>(CacheKeys.alignment);
  if (cached) return cached;
  const alignment = await api.getDailyAlignment(birth, signal);
  ensureLive(signal);
  cache.set(CacheKeys.alignment, alignment);
  return alignment;
}

export function friendAlignmentKey(friendId: number): string {
  return `${CacheKeys.alignment}:friend:${friendId}`;
}

export async function loadFriendAlignment(
  api: ContentApi,
  cache: SessionCache,
  user: BirthCoordinates,
  friendId: number,
  friend: BirthCoordinates,
  signal?: AbortSignal,
): Promise<FriendAlignmentResult> {
  const key = friendAlignmentKey(friendId);
  const cached = cache.get<FriendAlignmentResult>(key);
  if (cached) return cached;
  const alignment = await api.getFriendAlignment(user, friend, signal);
  ensureLive(signal);
  cache.set(key, alignment);
  return alignment;
}

function topKey(distribution: Record<string, number>, fallback: string): string {
  let best = fallback;
  let bestValue = -Infinity;
  for (const [key, value] of Object.entries(distribution)) {
    if (value > bestValue) {
      best = key;
      bestValue = value;
    }
  }
  return best;
}

/** Summarises a generated playlist into what the insight endpoint expects. */
export function insightRequestFor(playlist: PlaylistResult): PlaylistInsightRequest {
  const bpms = playlist.songs.map((s) => s.bpm).filter((bpm) => bpm > 0);
  return {
    energyPercent: Math.round(playlist.vibeMatchScore),
    dominantMood: topKey(playlist.moodDistribution, 'balanced'),
    dominantElement: topKey(playlist.elementDistribution, 'Unknown'),
    bpmMin: bpms.length ? Math.min(...bpms) : 100,
    bpmMax: bpms.length ? Math.max(...bpms) : 130,
  };
}

interface CachedInsight {
  request: PlaylistInsightRequest;
  insight: PlaylistInsight;
}

function sameRequest(a: PlaylistInsightRequest, b: PlaylistInsightRequest): boolean {
  return (
    a.energyPercent === b.energyPercent &&
    a.dominantMood === b.dominantMood &&
    a.dominantElement === b.dominantElement &&
    a.bpmMin === b.bpmMin &&
    a.bpmMax === b.bpmMax
  );
}

// Reused only for the playlist it was written for; a regenerated playlist asks again.
export async function loadPlaylistInsight(
  api: ContentApi,
  cache: SessionCache,
  birth: BirthCoordinates,
  playlist: PlaylistResult,
  signal?: AbortSignal,
): Promise<PlaylistInsight> {
  const request = insightRequestFor(playlist);
  const cached = cache.get<CachedInsight>(CacheKeys.playlistInsight);
  if (cached && sameRequest(cached.request, request)) return cached.insight;
  const insight = await api.getPlaylistInsight(birth, request, signal);
  ensureLive(signal);
  const entry: CachedInsight = { request, insight };
  cache.set(CacheKeys.playlistInsight, entry);
  return insight;
}
