import path from 'path';

import { EXPERIMENT_DEFAULTS, ERROR_MESSAGES, MODEL_DEFAULTS } from './constants/index.js';
import { ExperimentSettings, GpuLayersSetting } from './models/types.js';

function parseGpuLayers(value: string | undefined): GpuLayersSetting {
  if (!value || value === 'auto') return MODEL_DEFAULTS.GPU_LAYERS;
  if (value === 'max') return 'max';
  const layers = parseInt(value);
  return isNaN(layers) || layers < 0 ? MODEL_DEFAULTS.GPU_LAYERS : layers;
}

function parseLogLevel(value: string | undefined): LogLevel {
  return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info';
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const config = {
  // Model Configuration
  model: {
    path: process.env.MODEL_PATH || path.join(process.cwd(), 'models', MODEL_DEFAULTS.MODEL_FILE),
    contextSize: parseInt(process.env.MODEL_CONTEXT_SIZE || String(MODEL_DEFAULTS.CONTEXT_SIZE)),
    batchSize: parseInt(process.env.MODEL_BATCH_SIZE || String(MODEL_DEFAULTS.BATCH_SIZE)),
    threads: parseInt(process.env.MODEL_THREADS || String(MODEL_DEFAULTS.THREADS)),
    gpuLayers: parseGpuLayers(process.env.MODEL_GPU_LAYERS),
  },

  // Artifact output
  output: {
    directory: process.env.OUTPUT_DIR || process.cwd(),
  },

  // Logging Configuration
  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
    colorize: process.env.NODE_ENV !== 'production',
    toFile: process.env.NODE_ENV !== 'test' && process.env.LOG_TO_FILE !== 'false',
    directory: path.join(process.cwd(), 'logs'),
  },
} as const;

export type Config = typeof config;

/**
 * Build the immutable settings value handed to the loop controller.
 * The limits are fixed experiment constants unless a caller overrides them.
 */
export function createExperimentSettings(
  overrides: Partial<ExperimentSettings> = {}
): ExperimentSettings {
  const settings: ExperimentSettings = {
    maxIterations: overrides.maxIterations ?? EXPERIMENT_DEFAULTS.MAX_ITERATIONS,
    contextWordLimit: overrides.contextWordLimit ?? EXPERIMENT_DEFAULTS.CONTEXT_WORD_LIMIT,
  };

  const limits: Array<[keyof ExperimentSettings, number]> = [
    ['maxIterations', settings.maxIterations],
    ['contextWordLimit', settings.contextWordLimit],
  ];

  for (const [key, value] of limits) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`${ERROR_MESSAGES.INVALID_SETTINGS}: ${key} must be a positive integer (got ${value})`);
    }
  }

  return Object.freeze(settings);
}
