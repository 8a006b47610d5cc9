import { describe, it, expect } from 'vitest';
import { clamp, handleFromName } from '../src/lib/utils';
import { elementCompatibility, elementOf, isZodiacSign, modalityOf } from '../src/lib/zodiac';

describe('utils', () => {
  it('clamps into range', () => {
    expect(clamp(105, 0, 100)).toBe(100);
    expect(clamp(-3, 0, 100)).toBe(0);
    expect(clamp(42, 0, 100)).toBe(42);
  });

  it('derives handles from names', () => {
    expect(handleFromName('Jordan Rivera')).toBe('@jordanrivera');
  });
});

describe('zodiac tables', () => {
  it('knows each sign\'s element and modality', () => {
    expect(elementOf('Scorpio')).toBe('Water');
    expect(modalityOf('Scorpio')).toBe('Fixed');
    expect(elementOf('Unknown')).toBeNull();
    expect(isZodiacSign('Ophiuchus')).toBe(false);
  });

  it('scores element pairs symmetrically', () => {
    expect(elementCompatibility('Fire', 'Fire')).toBe(90);
    expect(elementCompatibility('Fire', 'Air')).toBe(80);
    expect(elementCompatibility('Air', 'Fire')).toBe(80);
    expect(elementCompatibility('Earth', 'Fire')).toBe(50);
    expect(elementCompatibility('Water', 'Fire')).toBe(40);
  });
});
