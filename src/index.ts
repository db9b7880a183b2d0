import 'dotenv/config';

import { config, createExperimentSettings } from './config.js';
import { ExperimentRunner } from './services/experimentRunner.js';
import { createLlamaEngineFactory } from './services/llamaInferenceEngine.js';
import { JsonLogWriter } from './services/logWriter.js';
import { LoopController } from './services/loopController.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Experiment');

async function main(): Promise<void> {
  const settings = createExperimentSettings();

  logger.info('✨ Self-feedback divergence experiment', {
    modelPath: config.model.path,
    contextSize: config.model.contextSize,
    maxIterations: settings.maxIterations,
    contextWordLimit: settings.contextWordLimit,
    outputDirectory: config.output.directory
  });

  const controller = new LoopController(settings, createLlamaEngineFactory(config.model));
  const runner = new ExperimentRunner(controller, new JsonLogWriter(config.output.directory));

  const summaries = await runner.run();

  for (const summary of summaries) {
    logger.info(`📊 ${summary.label}: ${summary.records} records (${summary.termination})`, {
      artifact: summary.artifactPath
    });
  }

  logger.info(`Experiment completed – logs saved to ${config.output.directory}`);
}

main().catch((error: unknown) => {
  logger.error('Experiment failed', error);
  process.exitCode = 1;
});
