import type { ChartSonification } from './schemas';
import type { FriendProfile } from './types';

export const CacheKeys = {
  dailyReading: 'daily_reading',
  zodiacSeasonCard: 'zodiac_season_card',
  alignment: 'alignment',
  playlistInsight: 'playlist_insight',
} as const;

/**
 * In-memory store for content fetched during one app session.
 *
 * One instance is created at startup and handed to whatever needs it (see AppServicesProvider).
 * Entries live until `clearAll()` or the end of the session: there is no eviction, no size bound
 * and no TTL. Payloads that carry their own expiry must be checked by the caller before use.
 */
export class SessionCache {
  userSonification: ChartSonification | null = null;
  dailySonification: ChartSonification | null = null;
  friends: FriendProfile[] | null = null;

  private readonly entries = new Map<string, unknown>();

  // The caller decides the payload type for a key; the cache stores it opaquely.
  get<T>(key: string): T | undefined {
    return this.entries.get(key) as T | undefined;
  }

  set(key: string, payload: unknown): void {
    this.entries.set(key, payload);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }

  clearSonification(): void {
    this.userSonification = null;
    this.dailySonification = null;
  }

  // sign-out
  clearAll(): void {
    this.clearSonification();
    this.friends = null;
    this.entries.clear();
  }
}
