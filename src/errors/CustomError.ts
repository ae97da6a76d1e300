import { validationErrorType } from 'App/types/errorType';

export class CustomError extends Error {
  public code: string;
  public statusCode: number;
  public details?: validationErrorType[];

  constructor(
    message: string,
    code: string,
    statusCode: number,
    details?: validationErrorType[],
  ) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
  }
}

export class NotFoundError extends CustomError {
  constructor(message: string = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
  }
}

export class ValidationError extends CustomError {
  constructor(
    message: string = 'Validation error',
    details?: validationErrorType[],
  ) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/** The requested resource is busy; the caller may retry once it is released. */
export class ConflictError extends CustomError {
  constructor(message: string = 'Conflict') {
    super(message, 'CONFLICT', 409);
  }
}

export class CorsNotAllowedError extends CustomError {
  public readonly origin: string;

  constructor(origin: string) {
    super(`Origin ${origin} is not allowed`, 'NOT_ALLOWED_BY_CORS', 403);
    this.origin = origin;
  }
}

/* -------------------------------------------------------------------------------------------------
 * Pipeline errors: the offending artifact or row is skipped, the batch continues.
 * ------------------------------------------------------------------------------------------------- */

export class ParameterNotFoundError extends CustomError {
  public readonly filePath: string;

  constructor(filePath: string) {
    super(
      `No swept parameter found for ${filePath}`,
      'PARAMETER_NOT_FOUND',
      422,
    );
    this.filePath = filePath;
  }
}

export class ArtifactUnreadableError extends CustomError {
  public readonly filePath: string;

  constructor(filePath: string, reason?: string) {
    super(
      `Cannot read scalar artifact ${filePath}${reason ? `: ${reason}` : ''}`,
      'ARTIFACT_UNREADABLE',
      422,
    );
    this.filePath = filePath;
  }
}

export class MissingModelInputError extends CustomError {
  public readonly missing: string[];

  constructor(missing: string[]) {
    super(
      `Energy model input missing: ${missing.join(', ')}`,
      'MISSING_MODEL_INPUT',
      422,
    );
    this.missing = missing;
  }
}

/* -------------------------------------------------------------------------------------------------
 * Orchestrator errors
 * ------------------------------------------------------------------------------------------------- */

export class ArtifactMissingError extends CustomError {
  constructor(expectedPath: string) {
    super(`Expected artifact not produced: ${expectedPath}`, 'ARTIFACT_MISSING', 500);
  }
}

export class ExternalToolNotFoundError extends CustomError {
  constructor(toolPath: string) {
    super(`Simulator binary not found: ${toolPath}`, 'EXTERNAL_TOOL_NOT_FOUND', 500);
  }
}

export class ConfigurationMissingError extends CustomError {
  constructor(what: string) {
    super(`Configuration missing: ${what}`, 'CONFIGURATION_MISSING', 500);
  }
}

/* -------------------------------------------------------------------------------------------------
 * Comparator errors
 * ------------------------------------------------------------------------------------------------- */

export class ScenarioNotFoundError extends CustomError {
  public readonly scenarioId: string;

  constructor(scenarioId: string, root: string) {
    super(
      `No result directory for scenario ${scenarioId} under ${root}`,
      'SCENARIO_NOT_FOUND',
      404,
    );
    this.scenarioId = scenarioId;
  }
}

const RECOVERABLE_CODES = new Set([
  'PARAMETER_NOT_FOUND',
  'ARTIFACT_UNREADABLE',
  'MISSING_MODEL_INPUT',
  'ARTIFACT_MISSING',
  'SCENARIO_NOT_FOUND',
]);

/**
 * True for errors that only invalidate one artifact, row, run or scenario.
 * Everything else aborts the invocation.
 */
export function isRecoverable(err: unknown): boolean {
  return err instanceof CustomError && RECOVERABLE_CODES.has(err.code);
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
