import type { Element, Modality, ZodiacSign } from './types';
import { ZODIAC_SIGNS } from './types';

const SIGN_ELEMENTS: Record<ZodiacSign, Element> = {
  Aries: 'Fire', Leo: 'Fire', Sagittarius: 'Fire',
  Taurus: 'Earth', Virgo: 'Earth', Capricorn: 'Earth',
  Gemini: 'Air', Libra: 'Air', Aquarius: 'Air',
  Cancer: 'Water', Scorpio: 'Water', Pisces: 'Water',
};

const SIGN_MODALITIES: Record<ZodiacSign, Modality> = {
  Aries: 'Cardinal', Cancer: 'Cardinal', Libra: 'Cardinal', Capricorn: 'Cardinal',
  Taurus: 'Fixed', Leo: 'Fixed', Scorpio: 'Fixed', Aquarius: 'Fixed',
  Gemini: 'Mutable', Virgo: 'Mutable', Sagittarius: 'Mutable', Pisces: 'Mutable',
};

// same 90, complementary 80, neutral 50, opposing 40
const ELEMENT_COMPATIBILITY: Record<Element, Record<Element, number>> = {
  Fire: { Fire: 90, Air: 80, Earth: 50, Water: 40 },
  Earth: { Earth: 90, Water: 80, Fire: 50, Air: 40 },
  Air: { Air: 90, Fire: 80, Water: 50, Earth: 40 },
  Water: { Water: 90, Earth: 80, Air: 50, Fire: 40 },
};

export function isZodiacSign(s: string): s is ZodiacSign {
  return (ZODIAC_SIGNS as readonly string[]).includes(s);
}

export function elementOf(sign: string): Element | null {
  return isZodiacSign(sign) ? SIGN_ELEMENTS[sign] : null;
}

export function modalityOf(sign: string): Modality | null {
  return isZodiacSign(sign) ? SIGN_MODALITIES[sign] : null;
}

export function elementCompatibility(a: Element, b: Element): number {
  return ELEMENT_COMPATIBILITY[a][b];
}
