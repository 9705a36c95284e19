export type WizardStage = 'config' | 'globals' | 'files' | 'commands' | 'output';

export class WizardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: WizardStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'WizardError';
  }
}

/**
 * A line did not split into the expected number of tokens.
 * Fatal: aborts the whole run.
 */
export class InputShapeError extends WizardError {
  constructor(message: string, stage?: WizardStage) {
    super(message, 'INPUT_SHAPE', stage);
    this.name = 'InputShapeError';
  }
}

/**
 * The input stream failed, or ended where an answer was required.
 * Fatal: aborts the whole run.
 */
export class InputReadError extends WizardError {
  constructor(message: string, stage?: WizardStage, cause?: Error) {
    super(message, 'INPUT_READ', stage, cause);
    this.name = 'InputReadError';
  }
}

/**
 * The finished document could not be written. Logged only; never
 * changes the exit status.
 */
export class OutputError extends WizardError {
  constructor(message: string, public readonly destination: string, cause?: Error) {
    super(message, 'OUTPUT_ERROR', 'output', cause);
    this.name = 'OutputError';
  }
}

export class ConfigError extends WizardError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class DocumentFormatError extends WizardError {
  constructor(message: string, cause?: Error) {
    super(message, 'DOCUMENT_FORMAT', undefined, cause);
    this.name = 'DocumentFormatError';
  }
}

/**
 * Prefix an error with the stage it escaped from, keeping its class and code
 * so callers can still tell fatal input errors apart.
 */
export function withContext(context: string, stage: WizardStage, err: unknown): WizardError {
  if (err instanceof InputShapeError) {
    return new InputShapeError(`${context}: ${err.message}`, stage);
  }
  if (err instanceof InputReadError) {
    return new InputReadError(`${context}: ${err.message}`, stage, err.cause);
  }
  const cause = err instanceof Error ? err : new Error(String(err));
  return new WizardError(`${context}: ${cause.message}`, 'UNKNOWN_ERROR', stage, cause);
}
