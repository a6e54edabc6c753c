// Language detection tests

import { describe, it, expect } from 'vitest';
import { LanguageDetector, majorityLanguage } from '../src/index';

const detector = new LanguageDetector();

describe('LanguageDetector', () => {
  it('recognizes listed French artists regardless of case and accents', () => {
    expect(detector.detect('Freeze Corleone')).toBe('fr');
    expect(detector.detect('  ANGÈLE ')).toBe('fr');
    expect(detector.detect('Maître Gims')).toBe('fr');
  });

  it('matches whole names only', () => {
    expect(detector.detect('Air')).toBe('fr');
    expect(detector.detect('Blair')).toBe('en');
  });

  it('uses French genre markers', () => {
    expect(detector.detect('Someone New', ['Rap Français'])).toBe('fr');
    expect(detector.detect('Someone New', ['Chanson française', 'Pop'])).toBe('fr');
    expect(detector.detect('Someone New', ['Rap/Hip Hop'])).toBe('en');
  });
});

describe('majorityLanguage', () => {
  it('needs a strict French majority', () => {
    expect(majorityLanguage(['fr', 'fr', 'en'])).toBe('fr');
    expect(majorityLanguage(['fr', 'en'])).toBe('en');
    expect(majorityLanguage([])).toBe('en');
  });
});
