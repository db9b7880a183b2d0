/**
 * Sampling profiles for the two experiment modes
 */

import { SamplingMode, SamplingProfile } from '../models/types.js';

/**
 * Stochastic mode, expected to diverge
 */
export const INJECTIVE_PROFILE: SamplingProfile = Object.freeze({
  mode: SamplingMode.INJECTIVE,
  deterministic: false,
  temperature: 1.0,
  topP: 0.95,       // Typical nucleus sampling
  topK: 40,
  repeatPenalty: 1.05, // Mild anti-repetition
  maxGeneratedTokens: 32
});

/**
 * Greedy mode, expected to converge
 * - no nucleus truncation, no repetition penalty, fixed seed
 */
export const DETERMINISTIC_PROFILE: SamplingProfile = Object.freeze({
  mode: SamplingMode.DETERMINISTIC,
  deterministic: true,
  temperature: 0.0,
  topP: 1.0,
  topK: 1,
  repeatPenalty: 1.0,
  seed: 42,
  maxGeneratedTokens: 8
});

/**
 * Profiles in the order the experiment runs them
 */
export const SAMPLING_PROFILES: readonly SamplingProfile[] = Object.freeze([
  INJECTIVE_PROFILE,
  DETERMINISTIC_PROFILE
]);

export function getSamplingProfile(mode: SamplingMode): SamplingProfile {
  return mode === SamplingMode.DETERMINISTIC ? DETERMINISTIC_PROFILE : INJECTIVE_PROFILE;
}
