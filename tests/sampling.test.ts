import { describe, it, expect } from 'vitest';

import {
  DETERMINISTIC_PROFILE,
  INJECTIVE_PROFILE,
  SAMPLING_PROFILES,
  getSamplingProfile
} from '../src/constants/index.js';
import { SamplingMode } from '../src/models/types.js';

describe('sampling profiles', () => {
  it('defines the injective profile', () => {
    expect(INJECTIVE_PROFILE).toEqual({
      mode: 'injective',
      deterministic: false,
      temperature: 1.0,
      topP: 0.95,
      topK: 40,
      repeatPenalty: 1.05,
      maxGeneratedTokens: 32
    });
    expect(INJECTIVE_PROFILE.seed).toBeUndefined();
  });

  it('defines the deterministic profile', () => {
    expect(DETERMINISTIC_PROFILE).toEqual({
      mode: 'deterministic',
      deterministic: true,
      temperature: 0.0,
      topP: 1.0,
      topK: 1,
      repeatPenalty: 1.0,
      seed: 42,
      maxGeneratedTokens: 8
    });
  });

  it('runs injective before deterministic', () => {
    expect(SAMPLING_PROFILES.map(p => p.mode)).toEqual(['injective', 'deterministic']);
  });

  it('is immutable', () => {
    expect(Object.isFrozen(INJECTIVE_PROFILE)).toBe(true);
    expect(Object.isFrozen(DETERMINISTIC_PROFILE)).toBe(true);
    expect(Object.isFrozen(SAMPLING_PROFILES)).toBe(true);
  });

  it('looks profiles up by mode', () => {
    expect(getSamplingProfile(SamplingMode.INJECTIVE)).toBe(INJECTIVE_PROFILE);
    expect(getSamplingProfile(SamplingMode.DETERMINISTIC)).toBe(DETERMINISTIC_PROFILE);
  });
});
