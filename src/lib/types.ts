export const ZODIAC_SIGNS = [
  'Aries', 'Taurus', 'Gemini', 'Cancer', 'Leo', 'Virgo',
  'Libra', 'Scorpio', 'Sagittarius', 'Capricorn', 'Aquarius', 'Pisces',
] as const;

export type ZodiacSign = typeof ZODIAC_SIGNS[number];
export type Element = 'Fire' | 'Earth' | 'Air' | 'Water';
export type Modality = 'Cardinal' | 'Fixed' | 'Mutable';
export type PresenceStatus = 'online' | 'offline';

export interface FriendProfile {
  readonly id: number;
  readonly name: string;
  readonly username: string;       // '@handle'
  readonly sunSign: string;        // one of ZODIAC_SIGNS, 'Unknown' when the backend omits it
  readonly moonSign: string;
  readonly risingSign: string;
  readonly element: string;
  readonly modality: string;
  readonly dominantFrequency: string; // e.g. '432 Hz'
  readonly compatibilityScore: number; // 0..100
  readonly status: PresenceStatus;
  readonly lastAlignedAt: number | null; // epoch ms
  readonly mutualPlanets: readonly string[];
  readonly avatarColors?: readonly [string, string];
  // birth data for synastry calls
  readonly birthDatetime?: string;
  readonly birthLatitude?: number;
  readonly birthLongitude?: number;
  readonly birthTimezone?: string;
}

// A friend request waiting for the user to accept or decline
export interface PendingRequest {
  readonly id: number;
  readonly name: string;
  readonly sunSign: string;
  readonly avatarColors?: readonly [string, string];
}

export type TieRule = 'sun' | 'moon' | 'rising' | 'element' | 'planet';

export interface ConnectionEdge {
  fromId: number;
  toId: number;
  tie: TieRule;
  sharedPlanet?: string; // set when tie === 'planet'
  compatibility: number;
}

export type SortMode = 'all' | 'recent' | 'compatible';

export interface BirthData {
  name: string;
  datetime: string;      // YYYY-MM-DDTHH:MM:SS
  latitude: number;
  longitude: number;
  timezone: string;
  locationName: string;
}

export interface GenrePreferences {
  genres: string[];
  subgenres: string[];
}

export interface NotificationPreferences {
  dailyEnabled: boolean;
  dailyTime: string; // HH:MM (24h)
  transitAlerts: boolean;
  friendActivity: boolean;
  updatedAt: number;
}
