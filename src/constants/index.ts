/**
 * Central constants module - re-exports all constants for easy access
 */

// Sampling profiles
export * from './sampling.js';

// Prompt construction and stop markers
export * from './prompts.js';

/**
 * Fixed experiment limits
 */
export const EXPERIMENT_DEFAULTS = {
  MAX_ITERATIONS: 10,          // Max self-feedback steps
  CONTEXT_WORD_LIMIT: 3_500    // Safety stop before the 4096-token window
} as const;

/**
 * Model loading defaults
 */
export const MODEL_DEFAULTS = {
  MODEL_FILE: 'Meta-Llama-3-8B-Instruct.Q4_0.gguf',
  CONTEXT_SIZE: 4096,
  BATCH_SIZE: 512,
  THREADS: 4,
  GPU_LAYERS: 'auto'
} as const;

// Common error messages
export const ERROR_MESSAGES = {
  MODEL_NOT_FOUND: 'Model file not found',
  MODEL_LOAD_FAILED: 'Failed to load model',
  ENGINE_DISPOSED: 'Inference engine already disposed',
  INVALID_SETTINGS: 'Invalid experiment settings',
  WRITE_FAILED: 'Failed to write log artifact'
} as const;
