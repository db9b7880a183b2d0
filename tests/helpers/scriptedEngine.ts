import { InferenceEngine, InferenceEngineFactory, SamplingProfile } from '../../src/models/types.js';

export interface EngineCall {
  prompt: string;
  profile: SamplingProfile;
  stopMarkers: readonly string[];
}

/**
 * In-process stand-in for the model: replays a fixed list of completions,
 * repeating the last one once the script runs out.
 */
export class ScriptedEngine implements InferenceEngine {
  readonly calls: EngineCall[] = [];
  disposeCount = 0;

  constructor(
    private readonly script: ReadonlyArray<string | Error>,
    private readonly events: string[] = []
  ) {}

  async complete(prompt: string, profile: SamplingProfile, stopMarkers: readonly string[]): Promise<string> {
    this.calls.push({ prompt, profile, stopMarkers });
    const step = this.script[Math.min(this.calls.length - 1, this.script.length - 1)];
    if (step instanceof Error) {
      throw step;
    }
    return step ?? '';
  }

  async dispose(): Promise<void> {
    this.disposeCount++;
    this.events.push('dispose');
  }
}

export function scriptedFactory(
  script: ReadonlyArray<string | Error>,
  events: string[] = []
): { factory: InferenceEngineFactory; engines: ScriptedEngine[] } {
  const engines: ScriptedEngine[] = [];
  const factory: InferenceEngineFactory = async (profile) => {
    events.push(`engine:${profile.mode}`);
    const engine = new ScriptedEngine(script, events);
    engines.push(engine);
    return engine;
  };
  return { factory, engines };
}
