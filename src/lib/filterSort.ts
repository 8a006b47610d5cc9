import type { SortMode } from './types';

export interface Sortable {
  readonly name: string;
  readonly compatibilityScore: number;
  readonly lastAlignedAt: number | null;
}

export const SORT_MODES: ReadonlyArray<{ mode: SortMode; label: string }> = [
  { mode: 'all', label: 'All' },
  { mode: 'recent', label: 'Recent' },
  { mode: 'compatible', label: 'Most Compatible' },
];

// Array.prototype.sort is stable, so ties keep their input order.
function byCompatibility(a: Sortable, b: Sortable) {
  return b.compatibilityScore - a.compatibilityScore;
}

function byRecency(a: Sortable, b: Sortable) {
  const ta = a.lastAlignedAt ?? -Infinity;
  const tb = b.lastAlignedAt ?? -Infinity;
  if (ta === tb) return 0;
  return ta > tb ? -1 : 1;
}

/** Filter by case-insensitive name substring, then order by `mode`. Never mutates `items`. */
export function applyFilterSort<T extends Sortable>(items: readonly T[], query: string, mode: SortMode): T[] {
  const q = query.trim().toLowerCase();
  const out = q ? items.filter((it) => it.name.toLowerCase().includes(q)) : [...items];
  if (mode === 'compatible') out.sort(byCompatibility);
  else if (mode === 'recent') out.sort(byRecency);
  return out;
}

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function plural(n: number, unit: string) {
  return `${n} ${unit}${n === 1 ? '' : 's'} ago`;
}

/** Display label for a last-aligned timestamp ('2 hours ago', 'Yesterday', ...). */
export function formatLastAligned(at: number | null, now: number = Date.now()): string {
  if (at == null) return 'Never';
  const diff = Math.max(0, now - at);
  if (diff < MINUTE) return 'Just now';
  if (diff < HOUR) return plural(Math.floor(diff / MINUTE), 'minute');
  if (diff < DAY) return plural(Math.floor(diff / HOUR), 'hour');
  const days = Math.floor(diff / DAY);
  if (days === 1) return 'Yesterday';
  if (days < 7) return `${days} days ago`;
  if (days < 35) return plural(Math.floor(days / 7), 'week');
  const d = new Date(at);
  return `${MONTHS[d.getUTCMonth()]} ${d.getUTCDate()}, ${d.getUTCFullYear()}`;
}
