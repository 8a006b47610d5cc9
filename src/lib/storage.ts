import { z } from 'zod';
import type { BirthData, GenrePreferences, NotificationPreferences } from './types';

// Every key this app writes starts with this prefix; clearAll() relies on it.
const STORAGE_PREFIX = 'astrotone_';

export const BIRTH_KEY = 'astrotone_birth_data_v1';
export const GENRES_KEY = 'astrotone_genres_v1';
export const NOTIFICATIONS_KEY = 'astrotone_notifications_v1';
export const LAST_FRIEND_KEY = 'astrotone_last_friend_v1';

function readJSON(key: string): unknown {
  const raw = localStorage.getItem(key);
  if (raw == null) return null;
  try {
    return JSON.parse(raw);
  } catch {
    console.warn('[storage] corrupt value dropped', key);
    localStorage.removeItem(key);
    return null;
  }
}

// ---------------- Birth data ----------------

const BirthDataSchema = z.object({
  name: z.string(),
  datetime: z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2})?$/),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  timezone: z.string().min(1).default('UTC'),
  locationName: z.string().default(''),
});

export function loadBirthData(): BirthData | null {
  const parsed = BirthDataSchema.safeParse(readJSON(BIRTH_KEY));
  return parsed.success ? parsed.data : null;
}

export function saveBirthData(data: BirthData): BirthData {
  const safe = BirthDataSchema.parse(data);
  localStorage.setItem(BIRTH_KEY, JSON.stringify(safe));
  return safe;
}

export function hasBirthData(): boolean {
  return loadBirthData() !== null;
}

// ---------------- Genres ----------------

function cleanList(v: unknown): string[] {
  if (!Array.isArray(v)) return [];
  const items = v.filter((x): x is string => typeof x === 'string').map((x) => x.trim()).filter(Boolean);
  return Array.from(new Set(items));
}

export function loadGenres(): GenrePreferences {
  const obj = readJSON(GENRES_KEY);
  if (!obj || typeof obj !== 'object') return { genres: [], subgenres: [] };
  return {
    genres: 'genres' in obj ? cleanList(obj.genres) : [],
    subgenres: 'subgenres' in obj ? cleanList(obj.subgenres) : [],
  };
}

export function saveGenres(prefs: GenrePreferences): GenrePreferences {
  const safe: GenrePreferences = { genres: cleanList(prefs.genres), subgenres: cleanList(prefs.subgenres) };
  localStorage.setItem(GENRES_KEY, JSON.stringify(safe));
  return safe;
}

// ---------------- Notifications ----------------

const TIME_RE = /^([01]\d|2[0-3]):[0-5]\d$/;

// Each field falls back on its own, so one bad value does not reset the rest.
const NotificationsSchema = z.object({
  dailyEnabled: z.boolean().catch(false),
  dailyTime: z.string().regex(TIME_RE).catch('09:00'),
  transitAlerts: z.boolean().catch(false),
  friendActivity: z.boolean().catch(true),
  updatedAt: z.number().catch(() => Date.now()),
});

export function loadNotificationPreferences(): NotificationPreferences {
  const obj = readJSON(NOTIFICATIONS_KEY);
  return NotificationsSchema.parse(obj && typeof obj === 'object' ? obj : {});
}

export function saveNotificationPreferences(prefs: NotificationPreferences): NotificationPreferences {
  const safe: NotificationPreferences = {
    dailyEnabled: !!prefs.dailyEnabled,
    dailyTime: TIME_RE.test(prefs.dailyTime) ? prefs.dailyTime : '09:00',
    transitAlerts: !!prefs.transitAlerts,
    friendActivity: !!prefs.friendActivity,
    updatedAt: Date.now(),
  };
  localStorage.setItem(NOTIFICATIONS_KEY, JSON.stringify(safe));
  return safe;
}

// ---------------- Last selected friend ----------------

export function loadLastSelectedFriendId(): number | null {
  const v = readJSON(LAST_FRIEND_KEY);
  return typeof v === 'number' && Number.isInteger(v) ? v : null;
}

export function saveLastSelectedFriendId(id: number | null) {
  if (id == null) localStorage.removeItem(LAST_FRIEND_KEY);
  else localStorage.setItem(LAST_FRIEND_KEY, JSON.stringify(id));
}

// --- Full data wipe (local-only) ---
export function clearAll() {
  const toRemove: string[] = [];
  for (let i = 0; i < localStorage.length; i++) {
    const key = localStorage.key(i);
    if (key && key.startsWith(STORAGE_PREFIX)) toRemove.push(key);
  }
  for (const k of toRemove) localStorage.removeItem(k);
}
