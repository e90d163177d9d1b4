export interface PipelineSettings {
  autoRun: boolean;
  osMode: boolean;
  maxOutputChars: number;
  scrollbarHint: boolean;
  maxIterations: number;
  appendExecutionInstructions: boolean;
}

export const DEFAULT_PIPELINE_SETTINGS: Readonly<PipelineSettings> =
  Object.freeze({
    autoRun: false,
    osMode: false,
    maxOutputChars: 2800,
    scrollbarHint: false,
    maxIterations: 10,
    appendExecutionInstructions: true,
  });

function pickBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function pickPositiveInteger(value: unknown, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.floor(value);
}

export function normalizePipelineSettings(
  input: unknown,
): Readonly<PipelineSettings> {
  const source =
    input && typeof input === "object" && !Array.isArray(input)
      ? (input as Record<string, unknown>)
      : {};
  const defaults = DEFAULT_PIPELINE_SETTINGS;

  return Object.freeze({
    autoRun: pickBoolean(source.autoRun, defaults.autoRun),
    osMode: pickBoolean(source.osMode, defaults.osMode),
    maxOutputChars: pickPositiveInteger(
      source.maxOutputChars,
      defaults.maxOutputChars,
    ),
    scrollbarHint: pickBoolean(source.scrollbarHint, defaults.scrollbarHint),
    maxIterations: pickPositiveInteger(
      source.maxIterations,
      defaults.maxIterations,
    ),
    appendExecutionInstructions: pickBoolean(
      source.appendExecutionInstructions,
      defaults.appendExecutionInstructions,
    ),
  });
}

export interface ConfigPort {
  getDefaultModel(): Promise<string>;
  setDefaultModel(model: string): Promise<void>;
  getPipelineSettings(): Promise<Readonly<PipelineSettings>>;
}
