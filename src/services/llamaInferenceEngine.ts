import fs from 'fs/promises';

import { getLlama, LlamaCompletion, LlamaContext, LlamaModel } from 'node-llama-cpp';

import { ERROR_MESSAGES } from '../constants/index.js';
import { InferenceEngine, InferenceEngineFactory, ModelConfig, SamplingProfile } from '../models/types.js';
import { createLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/typeGuards.js';

type CompletionOptions = NonNullable<Parameters<LlamaCompletion['generateCompletion']>[1]>;

/**
 * LOCAL LLAMA.CPP TEXT-COMPLETION ENGINE
 *
 * Owns one loaded model and one context for the lifetime of a loop run.
 * Each completion gets its own context sequence, which is released afterwards.
 */
export class LlamaInferenceEngine implements InferenceEngine {
  private readonly logger = createLogger('LlamaInferenceEngine');
  private disposed = false;

  private constructor(
    private readonly model: LlamaModel,
    private readonly context: LlamaContext
  ) {}

  static async load(modelConfig: ModelConfig): Promise<LlamaInferenceEngine> {
    const logger = createLogger('LlamaInferenceEngine');
    const loadStartTime = Date.now();

    try {
      await fs.access(modelConfig.path);
    } catch (error) {
      throw new Error(`${ERROR_MESSAGES.MODEL_NOT_FOUND}: ${modelConfig.path}`, { cause: error });
    }

    try {
      const llama = await getLlama();

      logger.info('🔄 Loading model', {
        modelPath: modelConfig.path,
        contextSize: modelConfig.contextSize,
        gpuLayers: modelConfig.gpuLayers
      });

      const model = await llama.loadModel({
        modelPath: modelConfig.path,
        gpuLayers: modelConfig.gpuLayers,
      });

      const context = await model.createContext({
        contextSize: modelConfig.contextSize,
        batchSize: modelConfig.batchSize,
        threads: modelConfig.threads,
      });

      logger.info('✅ Model loaded', { loadTimeMs: Date.now() - loadStartTime });

      return new LlamaInferenceEngine(model, context);
    } catch (error) {
      logger.error(`${ERROR_MESSAGES.MODEL_LOAD_FAILED}: ${modelConfig.path}`, error);
      throw new Error(`${ERROR_MESSAGES.MODEL_LOAD_FAILED}: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  async complete(prompt: string, profile: SamplingProfile, stopMarkers: readonly string[]): Promise<string> {
    if (this.disposed) {
      throw new Error(ERROR_MESSAGES.ENGINE_DISPOSED);
    }

    const sequence = this.context.getSequence();

    try {
      const completion = new LlamaCompletion({ contextSequence: sequence });

      const generationOptions: CompletionOptions = {
        temperature: profile.temperature,
        topP: profile.topP,
        topK: profile.topK,
        maxTokens: profile.maxGeneratedTokens,
        customStopTriggers: [...stopMarkers],
        repeatPenalty: {
          penalty: profile.repeatPenalty,
          frequencyPenalty: 0.0,
          presencePenalty: 0.0
        }
      };

      if (profile.seed !== undefined) {
        generationOptions.seed = profile.seed;
      }

      const text = await completion.generateCompletion(prompt, generationOptions);

      this.logger.debug('📝 Completion generated', {
        mode: profile.mode,
        promptLength: prompt.length,
        responseLength: text.length
      });

      return text;
    } finally {
      // Always release the sequence so the next iteration can acquire one
      sequence.dispose();
    }
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    await this.context.dispose();
    await this.model.dispose();

    this.logger.info('✅ Engine disposed');
  }
}

/**
 * One engine per loop run; the profile is applied per completion, not at load.
 */
export function createLlamaEngineFactory(modelConfig: ModelConfig): InferenceEngineFactory {
  return async () => LlamaInferenceEngine.load(modelConfig);
}
