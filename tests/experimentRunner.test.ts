import { describe, it, expect } from 'vitest';

import { createExperimentSettings } from '../src/config.js';
import { LogRecord, LogWriter, TerminationReason } from '../src/models/types.js';
import { ExperimentRunner } from '../src/services/experimentRunner.js';
import { LoopController } from '../src/services/loopController.js';
import { scriptedFactory } from './helpers/scriptedEngine.js';

class RecordingWriter implements LogWriter {
  readonly writes: Array<{ label: string; records: readonly LogRecord[] }> = [];

  constructor(private readonly events: string[]) {}

  async write(label: string, records: readonly LogRecord[]): Promise<string> {
    this.events.push(`write:${label}`);
    this.writes.push({ label, records });
    return `/tmp/logs_${label}.json`;
  }
}

describe('ExperimentRunner', () => {
  it('runs both modes in order and writes each after its loop terminates', async () => {
    const events: string[] = [];
    const { factory } = scriptedFactory([' a b c d'], events);
    const writer = new RecordingWriter(events);
    const controller = new LoopController(createExperimentSettings({ maxIterations: 2 }), factory);

    const summaries = await new ExperimentRunner(controller, writer).run();

    expect(events).toEqual([
      'engine:injective',
      'dispose',
      'write:injective',
      'engine:deterministic',
      'dispose',
      'write:deterministic'
    ]);
    expect(summaries).toEqual([
      { label: 'injective', records: 2, termination: TerminationReason.COMPLETED, artifactPath: '/tmp/logs_injective.json' },
      { label: 'deterministic', records: 2, termination: TerminationReason.COMPLETED, artifactPath: '/tmp/logs_deterministic.json' }
    ]);
    expect(writer.writes[1].records).toEqual([
      { t: 0, ctx_len: 1, omega: 0 },
      { t: 1, ctx_len: 1, omega: 0 }
    ]);
  });

  it('aborts without writing when an engine call fails', async () => {
    const events: string[] = [];
    const { factory } = scriptedFactory([new Error('model unavailable')], events);
    const writer = new RecordingWriter(events);
    const controller = new LoopController(createExperimentSettings(), factory);

    await expect(new ExperimentRunner(controller, writer).run()).rejects.toThrow('model unavailable');
    expect(writer.writes).toHaveLength(0);
    expect(events).toEqual(['engine:injective', 'dispose']);
  });
});
