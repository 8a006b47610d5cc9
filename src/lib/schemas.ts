/**
 * Wire schemas for the backend's JSON payloads.
 *
 * Every response is decoded here once, snake_case in and camelCase out, so nothing past the
 * API client handles untyped maps. Defaults mirror what the backend omits on older deployments.
 */

import { z } from 'zod';
import type { FriendProfile, PendingRequest } from './types';
import { handleFromName } from './utils';
import { elementOf, modalityOf } from './zodiac';

// --- Sonification ---

export const PlanetSoundSchema = z.object({
  planet: z.string(),
  frequency: z.number(),
  intensity: z.number(),
  role: z.string().default(''),
  filter_type: z.string().default('lowpass'),
  filter_cutoff: z.number().default(0),
  attack: z.number(),
  decay: z.number(),
  reverb: z.number().default(0),
  pan: z.number(),
  house: z.number().int().default(1),
  house_degree: z.number().default(0),
  sign: z.string(),
}).transform((p) => ({
  planet: p.planet,
  frequency: p.frequency,
  intensity: p.intensity,
  role: p.role,
  filterType: p.filter_type,
  filterCutoff: p.filter_cutoff,
  attack: p.attack,
  decay: p.decay,
  reverb: p.reverb,
  pan: p.pan,
  house: p.house,
  houseDegree: p.house_degree,
  sign: p.sign,
}));

export type PlanetSound = z.output<typeof PlanetSoundSchema>;

export const ChartSonificationSchema = z.object({
  planets: z.array(PlanetSoundSchema),
  ascendant_sign: z.string(),
  dominant_frequency: z.number(),
  total_duration: z.number(),
}).transform((s) => ({
  planets: s.planets,
  ascendantSign: s.ascendant_sign,
  dominantFrequency: s.dominant_frequency,
  totalDuration: s.total_duration,
}));

export type ChartSonification = z.output<typeof ChartSonificationSchema>;

// --- Natal chart ---

export const NatalChartSchema = z.object({
  birth_datetime: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  timezone: z.string(),
  ascendant: z.number(),
  ascendant_sign: z.string(),
  planets: z.array(z.object({
    name: z.string(),
    longitude: z.number(),
    sign: z.string(),
    sign_degree: z.number(),
    house: z.number().int(),
    retrograde: z.boolean().default(false),
  })),
  house_cusps: z.array(z.number()).default([]),
}).transform((c) => ({
  birthDatetime: c.birth_datetime,
  latitude: c.latitude,
  longitude: c.longitude,
  timezone: c.timezone,
  ascendant: c.ascendant,
  ascendantSign: c.ascendant_sign,
  planets: c.planets.map((p) => ({
    name: p.name, longitude: p.longitude, sign: p.sign, signDegree: p.sign_degree, house: p.house, retrograde: p.retrograde,
  })),
  houseCusps: c.house_cusps,
}));

export type NatalChart = z.output<typeof NatalChartSchema>;

// --- Geocoding ---

export const LocationSchema = z.object({
  display_name: z.string(),
  city: z.string().nullish(),
  state: z.string().nullish(),
  country: z.string(),
  country_code: z.string(),
  latitude: z.number(),
  longitude: z.number(),
}).transform((l) => ({
  displayName: l.display_name,
  city: l.city ?? null,
  state: l.state ?? null,
  country: l.country,
  countryCode: l.country_code,
  latitude: l.latitude,
  longitude: l.longitude,
}));

export type Location = z.output<typeof LocationSchema>;

// --- AI readings ---

const PlaylistParamsSchema = z.object({
  bpm_min: z.number().int().default(110),
  bpm_max: z.number().int().default(130),
  energy: z.number().default(0.6),
  valence: z.number().default(0.5),
  genres: z.array(z.string()).default([]),
  key_mode: z.string().nullish(),
}).transform((p) => ({
  bpmMin: p.bpm_min,
  bpmMax: p.bpm_max,
  energy: p.energy,
  valence: p.valence,
  genres: p.genres,
  keyMode: p.key_mode ?? null,
}));

export const DailyReadingSchema = z.object({
  headline: z.string().default('Your Daily Horoscope'),
  horoscope: z.string().optional(),
  reading: z.string().optional(),
  cosmic_weather: z.string().default(''),
  energy_level: z.number().int().default(65),
  focus_area: z.string().default('Self-Expression'),
  moon_phase: z.string().default('Unknown'),
  dominant_element: z.string().default('Unknown'),
  playlist_params: PlaylistParamsSchema.default({}),
  generated_at: z.string().default(''),
}).transform((r) => ({
  headline: r.headline,
  // older responses only carry `reading`
  horoscope: r.horoscope ?? r.reading ?? '',
  cosmicWeather: r.cosmic_weather,
  energyLevel: r.energy_level,
  focusArea: r.focus_area,
  moonPhase: r.moon_phase,
  dominantElement: r.dominant_element,
  playlistParams: r.playlist_params,
  generatedAt: r.generated_at,
}));

export type DailyReading = z.output<typeof DailyReadingSchema>;

export const CompatibilityResultSchema = z.object({
  narrative: z.string(),
  overall_score: z.number().int(),
  strengths: z.array(z.string()),
  challenges: z.array(z.string()),
  shared_genres: z.array(z.string()),
}).transform((c) => ({
  narrative: c.narrative,
  overallScore: c.overall_score,
  strengths: c.strengths,
  challenges: c.challenges,
  sharedGenres: c.shared_genres,
}));

export type CompatibilityResult = z.output<typeof CompatibilityResultSchema>;

export const PlaylistInsightSchema = z.object({
  insight: z.string(),
  energy_percent: z.number().int(),
  dominant_mood: z.string(),
  astro_highlight: z.string(),
}).transform((i) => ({
  insight: i.insight,
  energyPercent: i.energy_percent,
  dominantMood: i.dominant_mood,
  astroHighlight: i.astro_highlight,
}));

export type PlaylistInsight = z.output<typeof PlaylistInsightSchema>;

// --- Alignment ---

const AspectSchema = z.object({
  planet1: z.string(),
  planet2: z.string(),
  aspect: z.string(),
  orb: z.number(),
  nature: z.enum(['harmonious', 'challenging', 'neutral']).catch('neutral'),
});

export type Aspect = z.output<typeof AspectSchema>;

export const AlignmentResultSchema = z.object({
  score: z.number().int().min(0).max(100),
  aspects: z.array(AspectSchema).default([]),
  dominant_energy: z.string(),
  description: z.string(),
}).transform((a) => ({
  score: a.score,
  aspects: a.aspects,
  dominantEnergy: a.dominant_energy,
  description: a.description,
}));

export type AlignmentResult = z.output<typeof AlignmentResultSchema>;

export const FriendAlignmentResultSchema = z.object({
  score: z.number().int().min(0).max(100),
  aspects: z.array(AspectSchema).default([]),
  dominant_energy: z.string(),
  description: z.string(),
  strengths: z.array(z.string()).default([]),
  challenges: z.array(z.string()).default([]),
}).transform((a) => ({
  score: a.score,
  aspects: a.aspects,
  dominantEnergy: a.dominant_energy,
  description: a.description,
  strengths: a.strengths,
  challenges: a.challenges,
}));

export type FriendAlignmentResult = z.output<typeof FriendAlignmentResultSchema>;

export const TransitsResultSchema = z.object({
  planets: z.array(z.object({
    name: z.string(),
    sign: z.string(),
    degree: z.number(),
    house: z.number().int().nullish(),
    retrograde: z.boolean().default(false),
  })),
  moon_phase: z.string(),
  retrograde: z.array(z.string()).default([]),
}).transform((t) => ({
  planets: t.planets.map((p) => ({ name: p.name, sign: p.sign, degree: p.degree, house: p.house ?? null, retrograde: p.retrograde })),
  moonPhase: t.moon_phase,
  retrograde: t.retrograde,
}));

export type TransitsResult = z.output<typeof TransitsResultSchema>;

/** Harmonious and challenging aspect counts, as shown on the Align screen. */
export function aspectBalance(aspects: readonly Aspect[]): { harmonious: number; challenging: number } {
  let harmonious = 0;
  let challenging = 0;
  for (const a of aspects) {
    if (a.nature === 'harmonious') harmonious++;
    else if (a.nature === 'challenging') challenging++;
  }
  return { harmonious, challenging };
}

// --- Zodiac season card ---

const SeasonTrackSchema = z.object({
  id: z.string().default(''),
  title: z.string().default('Unknown Track'),
  artist: z.string().default('Unknown Artist'),
  duration: z.string().default('0:00'),
  energy: z.number().int().default(70),
  url: z.string().nullish(),
}).transform((t) => ({ ...t, url: t.url ?? null }));

const SEASON_CARD_FALLBACK_MS = 30 * 24 * 60 * 60 * 1000;

export const ZodiacSeasonCardSchema = z.object({
  zodiac_sign: z.string().default('Unknown'),
  symbol: z.string().default('♈'),
  element: z.string().default('Fire'),
  modality: z.string().default('Cardinal'),
  date_range: z.string().default(''),
  ruling_planet: z.string().default('Sun'),
  personal_insight: z.object({
    headline: z.string().default('Season Insight'),
    subtext: z.string().default(''),
    meaning: z.string().default(''),
    focus_areas: z.array(z.string()).default([]),
  }).default({}),
  playlist_name: z.string().default('Seasonal Playlist'),
  playlist_description: z.string().default(''),
  total_duration: z.string().default('0 min'),
  vibe_tags: z.array(z.string()).default([]),
  tracks: z.array(SeasonTrackSchema).default([]),
  playlist_url: z.string().nullish(),
  zodiac_season_key: z.string().default(''),
  cached_until: z.string().optional(),
}).transform((c) => {
  const until = c.cached_until ? Date.parse(c.cached_until) : NaN;
  return {
    sign: c.zodiac_sign,
    symbol: c.symbol,
    element: c.element,
    modality: c.modality,
    dateRange: c.date_range,
    rulingPlanet: c.ruling_planet,
    personalInsight: {
      headline: c.personal_insight.headline,
      subtext: c.personal_insight.subtext,
      meaning: c.personal_insight.meaning,
      focusAreas: c.personal_insight.focus_areas,
    },
    playlistName: c.playlist_name,
    playlistDescription: c.playlist_description,
    totalDuration: c.total_duration,
    vibeTags: c.vibe_tags,
    tracks: c.tracks,
    playlistUrl: c.playlist_url ?? null,
    seasonKey: c.zodiac_season_key,
    // missing or unparsable: trust it for 30 days from decode time
    cachedUntil: Number.isNaN(until) ? Date.now() + SEASON_CARD_FALLBACK_MS : until,
  };
});

export type ZodiacSeasonCard = z.output<typeof ZodiacSeasonCardSchema>;

// --- Playlist ---

const SongSchema = z.object({
  id: z.string(),
  title: z.string(),
  artist: z.string(),
  album: z.string().default(''),
  duration_seconds: z.number().int(),
  bpm: z.number().int().default(0),
  energy: z.number().int().default(0),
  genres: z.array(z.string()).default([]),
}).transform((s) => ({
  id: s.id, title: s.title, artist: s.artist, album: s.album,
  durationSeconds: s.duration_seconds, bpm: s.bpm, energy: s.energy, genres: s.genres,
}));

export const PlaylistResultSchema = z.object({
  songs: z.array(SongSchema),
  total_duration_seconds: z.number().int(),
  vibe_match_score: z.number(),
  energy_arc: z.array(z.number()).default([]),
  element_distribution: z.record(z.number()).default({}),
  mood_distribution: z.record(z.number()).default({}),
  song_count: z.number().int().optional(),
}).transform((p) => ({
  songs: p.songs,
  totalDurationSeconds: p.total_duration_seconds,
  vibeMatchScore: p.vibe_match_score,
  energyArc: p.energy_arc,
  elementDistribution: p.element_distribution,
  moodDistribution: p.mood_distribution,
  songCount: p.song_count ?? p.songs.length,
}));

export type PlaylistResult = z.output<typeof PlaylistResultSchema>;

// --- Spotify ---

export const SpotifyAuthUrlSchema = z.object({ url: z.string(), state: z.string() });
export type SpotifyAuthUrl = z.output<typeof SpotifyAuthUrlSchema>;

export const SpotifyStatusSchema = z.object({
  connected: z.boolean().default(false),
  user_id: z.string().nullish(),
  display_name: z.string().nullish(),
  product: z.string().nullish(),
}).transform((s) => ({
  connected: s.connected,
  userId: s.user_id ?? null,
  displayName: s.display_name ?? null,
  product: s.product ?? null,
}));

export type SpotifyStatus = z.output<typeof SpotifyStatusSchema>;

// --- Friends ---

const HexColor = z.string().regex(/^#[0-9a-fA-F]{6}$/);

export const FriendProfileSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  username: z.string().optional(),
  avatar_colors: z.tuple([HexColor, HexColor]).optional(),
  sun_sign: z.string().optional(),
  sign: z.string().optional(),
  moon_sign: z.string().default('Unknown'),
  rising_sign: z.string().default('Unknown'),
  dominant_frequency: z.string().default('432 Hz'),
  element: z.string().default('Unknown'),
  modality: z.string().default('Unknown'),
  compatibility: z.number().int().min(0).max(100).default(0),
  status: z.enum(['online', 'offline']).default('offline'),
  last_aligned_at: z.string().nullish(),
  mutual_planets: z.array(z.string()).nullish(),
  birth_datetime: z.string().nullish(),
  birth_latitude: z.number().nullish(),
  birth_longitude: z.number().nullish(),
  birth_timezone: z.string().nullish(),
});

type FriendProfileWire = z.input<typeof FriendProfileSchema>;

export function decodeFriendProfile(raw: unknown): FriendProfile {
  const f = FriendProfileSchema.parse(raw);
  const at = f.last_aligned_at ? Date.parse(f.last_aligned_at) : NaN;
  const profile: FriendProfile = {
    id: f.id,
    name: f.name,
    username: f.username ?? handleFromName(f.name),
    sunSign: f.sun_sign ?? f.sign ?? 'Unknown',
    moonSign: f.moon_sign,
    risingSign: f.rising_sign,
    element: f.element,
    modality: f.modality,
    dominantFrequency: f.dominant_frequency,
    compatibilityScore: f.compatibility,
    status: f.status,
    lastAlignedAt: Number.isNaN(at) ? null : at,
    mutualPlanets: f.mutual_planets ?? [],
    ...(f.avatar_colors ? { avatarColors: f.avatar_colors } : {}),
    ...(f.birth_datetime ? { birthDatetime: f.birth_datetime } : {}),
    ...(f.birth_latitude != null ? { birthLatitude: f.birth_latitude } : {}),
    ...(f.birth_longitude != null ? { birthLongitude: f.birth_longitude } : {}),
    ...(f.birth_timezone ? { birthTimezone: f.birth_timezone } : {}),
  };
  return profile;
}

export function encodeFriendProfile(f: FriendProfile): FriendProfileWire {
  return {
    id: f.id,
    name: f.name,
    username: f.username,
    avatar_colors: f.avatarColors ? [f.avatarColors[0], f.avatarColors[1]] : undefined,
    sun_sign: f.sunSign,
    moon_sign: f.moonSign,
    rising_sign: f.risingSign,
    dominant_frequency: f.dominantFrequency,
    element: f.element,
    modality: f.modality,
    compatibility: f.compatibilityScore,
    status: f.status,
    last_aligned_at: f.lastAlignedAt == null ? null : new Date(f.lastAlignedAt).toISOString(),
    mutual_planets: [...f.mutualPlanets],
    birth_datetime: f.birthDatetime ?? null,
    birth_latitude: f.birthLatitude ?? null,
    birth_longitude: f.birthLongitude ?? null,
    birth_timezone: f.birthTimezone ?? null,
  };
}

export function hasBirthData(f: FriendProfile): boolean {
  return f.birthDatetime != null && f.birthLatitude != null && f.birthLongitude != null && f.birthTimezone != null;
}

export const PendingRequestSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  sign: z.string().default('Unknown'),
  avatar_colors: z.tuple([HexColor, HexColor]).optional(),
}).transform((r): PendingRequest => ({
  id: r.id,
  name: r.name,
  sunSign: r.sign,
  ...(r.avatar_colors ? { avatarColors: r.avatar_colors } : {}),
}));

/** Profile for a just-accepted request; chart details stay unknown until the backend fills them in. */
export function friendFromRequest(req: PendingRequest): FriendProfile {
  return {
    id: req.id,
    name: req.name,
    username: handleFromName(req.name),
    sunSign: req.sunSign,
    moonSign: 'Unknown',
    risingSign: 'Unknown',
    element: elementOf(req.sunSign) ?? 'Unknown',
    modality: modalityOf(req.sunSign) ?? 'Unknown',
    dominantFrequency: '432 Hz',
    compatibilityScore: 0,
    status: 'offline',
    lastAlignedAt: null,
    mutualPlanets: [],
    ...(req.avatarColors ? { avatarColors: req.avatarColors } : {}),
  };
}
