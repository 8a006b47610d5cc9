import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  BIRTH_KEY,
  GENRES_KEY,
  NOTIFICATIONS_KEY,
  clearAll,
  hasBirthData,
  loadBirthData,
  loadGenres,
  loadLastSelectedFriendId,
  loadNotificationPreferences,
  saveBirthData,
  saveGenres,
  saveLastSelectedFriendId,
  saveNotificationPreferences,
} from '../src/lib/storage';

// Minimal mock for localStorage
class LS {
  store: Record<string, string> = {};
  get length() { return Object.keys(this.store).length; }
  key(i: number) { return Object.keys(this.store)[i] ?? null; }
  getItem(k: string) { return this.store[k] ?? null; }
  setItem(k: string, v: string) { this.store[k] = String(v); }
  removeItem(k: string) { delete this.store[k]; }
  clear() { this.store = {}; }
}

let ls: LS;

beforeEach(() => {
  ls = new LS();
  vi.stubGlobal('localStorage', ls);
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.useRealTimers();
  vi.restoreAllMocks();
});

const birth = {
  name: 'Test User',
  datetime: '1995-03-14T09:30:00',
  latitude: 40.7128,
  longitude: -74.006,
  timezone: 'America/New_York',
  locationName: 'New York, USA',
};

describe('birth data', () => {
  it('round-trips through storage', () => {
    expect(hasBirthData()).toBe(false);
    saveBirthData(birth);
    expect(loadBirthData()).toEqual(birth);
    expect(hasBirthData()).toBe(true);
  });

  it('refuses to save out-of-range coordinates', () => {
    expect(() => saveBirthData({ ...birth, latitude: 95 })).toThrow();
    expect(ls.getItem(BIRTH_KEY)).toBeNull();
  });

  it('fills defaults for older records', () => {
    ls.setItem(BIRTH_KEY, JSON.stringify({ name: 'Test User', datetime: '1995-03-14T09:30', latitude: 1, longitude: 2 }));
    expect(loadBirthData()).toEqual({ name: 'Test User', datetime: '1995-03-14T09:30', latitude: 1, longitude: 2, timezone: 'UTC', locationName: '' });
  });

  it('drops corrupt JSON', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    ls.setItem(BIRTH_KEY, '{not json');
    expect(loadBirthData()).toBeNull();
    expect(ls.getItem(BIRTH_KEY)).toBeNull();
    expect(warn).toHaveBeenCalledWith('[storage] corrupt value dropped', BIRTH_KEY);
  });
});

describe('genres', () => {
  it('defaults to empty lists', () => {
    expect(loadGenres()).toEqual({ genres: [], subgenres: [] });
  });

  it('trims, drops blanks and de-duplicates', () => {
    const saved = saveGenres({ genres: [' jazz', 'jazz', '', 'pop '], subgenres: ['bebop'] });
    expect(saved).toEqual({ genres: ['jazz', 'pop'], subgenres: ['bebop'] });
    expect(loadGenres()).toEqual(saved);
  });

  it('ignores non-string entries in stored data', () => {
    ls.setItem(GENRES_KEY, JSON.stringify({ genres: ['soul', 7, null], subgenres: 'nope' }));
    expect(loadGenres()).toEqual({ genres: ['soul'], subgenres: [] });
  });
});

describe('notification preferences', () => {
  it('returns defaults when nothing is stored', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-06-01T08:00:00Z'));
    expect(loadNotificationPreferences()).toEqual({
      dailyEnabled: false,
      dailyTime: '09:00',
      transitAlerts: false,
      friendActivity: true,
      updatedAt: Date.parse('2025-06-01T08:00:00Z'),
    });
  });

  it('keeps valid fields when one is bad', () => {
    ls.setItem(NOTIFICATIONS_KEY, JSON.stringify({ dailyEnabled: true, dailyTime: '25:99', transitAlerts: true, friendActivity: false, updatedAt: 5 }));
    expect(loadNotificationPreferences()).toEqual({
      dailyEnabled: true, dailyTime: '09:00', transitAlerts: true, friendActivity: false, updatedAt: 5,
    });
  });

  it('stamps the save time', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-06-02T10:00:00Z'));
    const saved = saveNotificationPreferences({ dailyEnabled: true, dailyTime: '07:30', transitAlerts: false, friendActivity: true, updatedAt: 1 });
    expect(saved.updatedAt).toBe(Date.parse('2025-06-02T10:00:00Z'));
    expect(loadNotificationPreferences()).toEqual(saved);
  });
});

describe('last selected friend', () => {
  it('stores and clears the id', () => {
    expect(loadLastSelectedFriendId()).toBeNull();
    saveLastSelectedFriendId(3);
    expect(loadLastSelectedFriendId()).toBe(3);
    saveLastSelectedFriendId(null);
    expect(loadLastSelectedFriendId()).toBeNull();
  });
});

describe('clearAll', () => {
  it('removes only this app\'s keys', () => {
    saveBirthData(birth);
    saveGenres({ genres: ['jazz'], subgenres: [] });
    ls.setItem('other_app_key', 'keep');
    clearAll();
    expect(Object.keys(ls.store)).toEqual(['other_app_key']);
  });
});
