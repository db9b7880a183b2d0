import { MARKER_WORD_COST, SELF_TURN_MARKER, STOP_MARKERS } from '../constants/index.js';
import {
  ExperimentSettings,
  InferenceEngine,
  InferenceEngineFactory,
  LogRecord,
  LoopOutcome,
  SamplingProfile,
  TerminationReason
} from '../models/types.js';
import { createLogger } from '../utils/logger.js';
import { countWords } from '../utils/text.js';
import { omega } from './compressionMetric.js';

/**
 * SELF-FEEDBACK LOOP CONTROLLER
 *
 * Feeds the model its own accumulated output, one completion per iteration,
 * and records effective context length and compression gain for each step.
 *
 * Stops on the first of:
 * - iteration cap reached (COMPLETED)
 * - context word count above the safety limit (SAFETY_CUTOFF)
 * - an empty completion after trimming, deterministic profiles only (EMPTY_COMPLETION)
 */
export class LoopController {
  private readonly logger = createLogger('LoopController');

  constructor(
    private readonly settings: ExperimentSettings,
    private readonly createEngine: InferenceEngineFactory
  ) {}

  async run(profile: SamplingProfile): Promise<LogRecord[]> {
    const outcome = await this.execute(profile);
    return [...outcome.records];
  }

  /**
   * Run one loop with a freshly created engine. The engine is disposed
   * when the loop ends, including when generation throws.
   */
  async execute(profile: SamplingProfile): Promise<LoopOutcome> {
    const engine = await this.createEngine(profile);

    try {
      const outcome = await this.iterate(engine, profile);

      this.logger.info(`🏁 Loop finished (${profile.mode})`, {
        termination: outcome.termination,
        records: outcome.records.length,
        contextWords: outcome.contextWords
      });

      return outcome;
    } finally {
      await engine.dispose();
    }
  }

  private async iterate(engine: InferenceEngine, profile: SamplingProfile): Promise<LoopOutcome> {
    const records: LogRecord[] = [];
    let context = '';
    // A t = 0 empty completion has no earlier length to report; it reports 0
    let effectiveLength = 0;

    for (let t = 0; t < this.settings.maxIterations; t++) {
      let completion = await engine.complete(context + SELF_TURN_MARKER, profile, STOP_MARKERS);

      if (profile.deterministic) {
        completion = completion.trimStart();
        if (completion === '') {
          // Nothing substantive generated; log a zero-token step and stop
          records.push(Object.freeze({ t, ctx_len: effectiveLength, omega: 0 }));
          this.logger.debug(`Empty completion at t=${t}`, { mode: profile.mode });
          return { records, termination: TerminationReason.EMPTY_COMPLETION, contextWords: countWords(context) };
        }
      }

      context += completion;

      // Markers never enter the context, but their cost is still charged
      const contextWords = countWords(context);
      effectiveLength = Math.max(0, contextWords - MARKER_WORD_COST * (t + 1));

      const record: LogRecord = Object.freeze({ t, ctx_len: effectiveLength, omega: omega(completion) });
      records.push(record);

      this.logger.debug(`Iteration ${t}`, {
        mode: profile.mode,
        completionLength: completion.length,
        contextWords,
        ctxLen: record.ctx_len,
        omega: record.omega
      });

      if (contextWords > this.settings.contextWordLimit) {
        this.logger.warn(`⚠️ Context word limit exceeded at t=${t}`, {
          contextWords,
          limit: this.settings.contextWordLimit
        });
        return { records, termination: TerminationReason.SAFETY_CUTOFF, contextWords };
      }
    }

    return { records, termination: TerminationReason.COMPLETED, contextWords: countWords(context) };
  }
}
