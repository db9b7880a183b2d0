import { SAMPLING_PROFILES } from '../constants/index.js';
import { LogWriter, ModeSummary, SamplingProfile } from '../models/types.js';
import { createLogger } from '../utils/logger.js';
import { LoopController } from './loopController.js';

/**
 * Runs each sampling mode in turn and persists its records once the
 * corresponding loop has terminated. Modes never overlap.
 */
export class ExperimentRunner {
  private readonly logger = createLogger('ExperimentRunner');

  constructor(
    private readonly controller: LoopController,
    private readonly writer: LogWriter
  ) {}

  async run(profiles: readonly SamplingProfile[] = SAMPLING_PROFILES): Promise<ModeSummary[]> {
    const summaries: ModeSummary[] = [];

    for (const profile of profiles) {
      this.logger.info(`🚀 Starting ${profile.mode} run`, {
        temperature: profile.temperature,
        topP: profile.topP,
        topK: profile.topK,
        repeatPenalty: profile.repeatPenalty,
        seed: profile.seed ?? null,
        maxGeneratedTokens: profile.maxGeneratedTokens
      });

      const outcome = await this.controller.execute(profile);
      const artifactPath = await this.writer.write(profile.mode, outcome.records);

      summaries.push({
        label: profile.mode,
        records: outcome.records.length,
        termination: outcome.termination,
        artifactPath
      });
    }

    return summaries;
  }
}
