import type { StageName } from './types';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/** A stage's hard-required column or context value is absent. Aborts the run. */
export class MissingRequiredInputError extends PipelineError {
  constructor(
    public readonly stage: StageName,
    public readonly input: string
  ) {
    super(`Stage "${stage}" requires "${input}", which is missing`, 'MISSING_REQUIRED_INPUT', { stage, input });
    this.name = 'MissingRequiredInputError';
  }
}

export class InputFileNotFoundError extends PipelineError {
  constructor(public readonly filePath: string) {
    super(`Input file not found: ${filePath}`, 'INPUT_NOT_FOUND', { filePath });
    this.name = 'InputFileNotFoundError';
  }
}
