import { describe, it, expect } from 'vitest';
import { reorderPrebaseVowelSign } from '../../src/converter';

describe('reorderPrebaseVowelSign', () => {
  it('moves the vowel sign after the following character', () => {
    expect(reorderPrebaseVowelSign('fक')).toBe('कि');
    expect(reorderPrebaseVowelSign('fक fत')).toBe('कि ति');
  });

  it('leaves a trailing marker in place', () => {
    expect(reorderPrebaseVowelSign('कf')).toBe('कf');
    expect(reorderPrebaseVowelSign('f')).toBe('f');
  });

  it('handles each marker of a run against the character after it', () => {
    expect(reorderPrebaseVowelSign('ffक')).toBe('fिक');
  });

  it('moves a single code point, not a whole cluster', () => {
    expect(reorderPrebaseVowelSign('fक्त')).toBe('कि्त');
  });

  it('treats astral characters as one unit', () => {
    expect(reorderPrebaseVowelSign('f😀')).toBe('😀ि');
  });

  it('accepts a custom marker and vowel sign', () => {
    expect(reorderPrebaseVowelSign('#ab', '#', '!')).toBe('a!b');
  });
});
