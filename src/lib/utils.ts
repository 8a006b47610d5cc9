export function clamp(n: number, min: number, max: number) {
  return Math.max(min, Math.min(max, n));
}

// '@mayachen' from 'Maya Chen'
export function handleFromName(name: string): string {
  return '@' + name.toLowerCase().replace(/\s+/g, '');
}
