import { describe, expect, it } from 'vitest';

import { findDiseaseInfo, knownDiseases, lookupDiseaseInfo, NO_ADDITIONAL_INFO } from './knowledge';

describe('disease knowledge', () => {
  it('matches names case-insensitively and returns the same text each time', () => {
    const first = lookupDiseaseInfo('Early Blight');

    expect(first).toMatch(/^Early blight is a fungal disease caused by Alternaria solani/);
    expect(lookupDiseaseInfo('EARLY BLIGHT')).toBe(first);
    expect(lookupDiseaseInfo('early blight')).toBe(first);
    expect(lookupDiseaseInfo('  Early blight ')).toBe(first);
  });

  it('returns the placeholder for unknown or partial names', () => {
    expect(lookupDiseaseInfo('Citrus greening')).toBe(NO_ADDITIONAL_INFO);
    expect(lookupDiseaseInfo('blight')).toBe(NO_ADDITIONAL_INFO);
    expect(findDiseaseInfo('blight')).toBeUndefined();
  });

  it('ships the eleven reference entries', () => {
    expect(knownDiseases()).toEqual([
      'early blight',
      'late blight',
      'powdery mildew',
      'leaf spot',
      'rust',
      'bacterial spot',
      'mosaic virus',
      'brown spot',
      'septoria',
      'anthracnose',
      'healthy',
    ]);
  });
});
