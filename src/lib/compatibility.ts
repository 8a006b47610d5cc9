import type { ConnectionEdge, FriendProfile, TieRule } from './types';
import { clamp } from './utils';
import { elementCompatibility, elementOf } from './zodiac';

// Sign/element values the backend sends when it has nothing better
const UNKNOWN = 'Unknown';

function sameKnown(a: string, b: string): boolean {
  return a === b && a !== '' && a !== UNKNOWN;
}

interface Tie { tie: TieRule; sharedPlanet?: string }

// Rules are checked in priority order; the first one that matches classifies the pair.
function firstTie(a: FriendProfile, b: FriendProfile): Tie | null {
  if (sameKnown(a.sunSign, b.sunSign)) return { tie: 'sun' };
  if (sameKnown(a.moonSign, b.moonSign)) return { tie: 'moon' };
  if (sameKnown(a.risingSign, b.risingSign)) return { tie: 'rising' };
  if (sameKnown(a.element, b.element)) return { tie: 'element' };
  const planet = a.mutualPlanets.find((p) => b.mutualPlanets.includes(p));
  if (planet !== undefined) return { tie: 'planet', sharedPlanet: planet };
  return null;
}

// Deterministic pseudo-random in [0,1) so the same pair always gets the same variance
function seededRandom(seed: number): number {
  const x = Math.sin(seed * 9999) * 10000;
  return x - Math.floor(x);
}

/** Element-based compatibility of two friends' sun signs, 0..100 (50 when a sign is unknown). */
export function getFriendCompatibility(a: FriendProfile, b: FriendProfile): number {
  const e1 = elementOf(a.sunSign);
  const e2 = elementOf(b.sunSign);
  if (!e1 || !e2) return 50;
  const variance = (seededRandom(a.id * b.id) - 0.5) * 20;
  return clamp(Math.round(elementCompatibility(e1, e2) + variance), 0, 100);
}

export function buildConnections(friends: readonly FriendProfile[]): ConnectionEdge[] {
  const edges: ConnectionEdge[] = [];
  for (let i = 0; i < friends.length; i++) {
    for (let j = i + 1; j < friends.length; j++) {
      const a = friends[i];
      const b = friends[j];
      if (a.id === b.id) continue; // duplicate ids are a caller error; never emit a self-edge
      const match = firstTie(a, b);
      if (!match) continue;
      const edge: ConnectionEdge = { fromId: a.id, toId: b.id, tie: match.tie, compatibility: getFriendCompatibility(a, b) };
      if (match.sharedPlanet !== undefined) edge.sharedPlanet = match.sharedPlanet;
      edges.push(edge);
    }
  }
  return edges;
}

/**
 * Friends sharing an edge with `friend`, in edge order. When `edges` is omitted they are
 * recomputed from `allFriends`. A friend missing from `allFriends` has no connections.
 */
export function getConnectedFriends(
  friend: FriendProfile,
  edges: readonly ConnectionEdge[] | undefined,
  allFriends: readonly FriendProfile[],
): FriendProfile[] {
  const byId = new Map(allFriends.map((f) => [f.id, f] as const));
  if (!byId.has(friend.id)) return [];
  const list = edges ?? buildConnections(allFriends);
  const seen = new Set<number>();
  const connected: FriendProfile[] = [];
  for (const e of list) {
    let otherId: number;
    if (e.fromId === friend.id) otherId = e.toId;
    else if (e.toId === friend.id) otherId = e.fromId;
    else continue;
    if (otherId === friend.id || seen.has(otherId)) continue;
    const other = byId.get(otherId);
    if (!other) continue;
    seen.add(otherId);
    connected.push(other);
  }
  return connected;
}

export function buildConstellation(
  friends: readonly FriendProfile[],
  opts?: { minCompatibility?: number },
): ConnectionEdge[] {
  const min = opts?.minCompatibility ?? 0;
  return buildConnections(friends).filter((e) => e.compatibility >= min);
}

export type CompatibilityTier = 'high' | 'good' | 'medium' | 'low';

export const TIER_COLORS: Record<CompatibilityTier, string> = {
  high: '#00D4AA',
  good: '#FAFF0E',
  medium: '#FF8C42',
  low: '#E84855',
};

export function compatibilityTier(score: number): CompatibilityTier {
  if (score >= 85) return 'high';
  if (score >= 70) return 'good';
  if (score >= 50) return 'medium';
  return 'low';
}
