export enum SamplingMode {
  INJECTIVE = 'injective',
  DETERMINISTIC = 'deterministic'
}

export enum TerminationReason {
  COMPLETED = 'COMPLETED',
  SAFETY_CUTOFF = 'SAFETY_CUTOFF',
  EMPTY_COMPLETION = 'EMPTY_COMPLETION'
}

export interface SamplingProfile {
  readonly mode: SamplingMode;
  // Selects the trim + empty-completion short-circuit in the loop
  readonly deterministic: boolean;
  readonly temperature: number;
  readonly topP: number;
  readonly topK: number;
  readonly repeatPenalty: number;
  readonly seed?: number;
  readonly maxGeneratedTokens: number;
}

/**
 * One iteration of a self-feedback run. Field names are the on-disk format.
 */
export interface LogRecord {
  readonly t: number;
  readonly ctx_len: number;
  readonly omega: number;
}

export interface ExperimentSettings {
  readonly maxIterations: number;
  readonly contextWordLimit: number;
}

export interface LoopOutcome {
  records: readonly LogRecord[];
  termination: TerminationReason;
  contextWords: number;
}

export interface InferenceEngine {
  complete(prompt: string, profile: SamplingProfile, stopMarkers: readonly string[]): Promise<string>;
  dispose(): Promise<void>;
}

export type InferenceEngineFactory = (profile: SamplingProfile) => Promise<InferenceEngine>;

export interface LogWriter {
  write(label: string, records: readonly LogRecord[]): Promise<string>;
}

export interface ModeSummary {
  label: string;
  records: number;
  termination: TerminationReason;
  artifactPath: string;
}

export interface ModelConfig {
  path: string;
  contextSize: number;
  batchSize: number;
  threads: number;
  gpuLayers: GpuLayersSetting;
}

export type GpuLayersSetting = number | 'auto' | 'max';
