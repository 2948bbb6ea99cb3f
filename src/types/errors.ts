/**
 * Structured Error System for mln-bridge
 *
 * Provides machine-readable errors with codes, context, and suggestions.
 */

/**
 * Error codes for translation and engine operations
 */
export type MlnErrorCode =
  | 'LOOKUP_ERROR'          // Engine output names an unknown relation
  | 'FORMAT_ERROR'          // Engine output line matches no known grammar
  | 'COLLABORATOR_FAILURE'  // External engine or container failed
  | 'INVALID_PROBLEM'       // Relations/rules cannot be translated
  | 'NOT_SUPPORTED'         // Operation not offered by this engine
  | 'CONFIG_ERROR';         // Invalid engine options

/**
 * Structured error with code, message, and suggestions
 */
export interface MlnError {
  code: MlnErrorCode;
  message: string;
  suggestion?: string;
  context?: string;          // The offending line or value
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping MlnError for throw/catch patterns
 */
export class MlnException extends Error {
  public readonly error: MlnError;

  constructor(error: MlnError) {
    super(error.message);
    this.name = 'MlnException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MlnException);
    }
  }

  get code(): MlnErrorCode {
    return this.error.code;
  }

  toJSON(): MlnError {
    return this.error;
  }
}

/**
 * Create a lookup error for a name in engine output that matches no relation
 */
export function createLookupError(name: string, line: string): MlnException {
  return new MlnException({
    code: 'LOOKUP_ERROR',
    message: `Could not find relation (${name}) found in prior: '${line}'.`,
    context: line,
    details: { name },
  });
}

/**
 * Create a format error for an engine output line that could not be parsed
 */
export function createFormatError(
  message: string,
  line: string,
  details?: Record<string, unknown>
): MlnException {
  return new MlnException({
    code: 'FORMAT_ERROR',
    message: `${message}: '${line}'.`,
    context: line,
    details,
  });
}

/**
 * Create an error for a failed external collaborator (engine, container daemon)
 */
export function createCollaboratorFailure(
  message: string,
  details?: Record<string, unknown>
): MlnException {
  return new MlnException({
    code: 'COLLABORATOR_FAILURE',
    message: `Tuffy run failed: ${message}`,
    suggestion: 'Inspect the streamed engine log, or rerun with cleanupFiles disabled to keep the staged files',
    details,
  });
}

/**
 * Create an error for relations or rules that cannot be translated
 */
export function createInvalidProblemError(
  message: string,
  context?: string
): MlnException {
  return new MlnException({
    code: 'INVALID_PROBLEM',
    message,
    context,
  });
}

/**
 * Create an error for an operation the engine does not offer
 */
export function createNotSupportedError(engine: string, operation: string): MlnException {
  return new MlnException({
    code: 'NOT_SUPPORTED',
    message: `${engine} does not support ${operation}`,
    details: { engine, operation },
  });
}

/**
 * Create a configuration error
 */
export function createConfigError(
  message: string,
  details?: Record<string, unknown>
): MlnException {
  return new MlnException({
    code: 'CONFIG_ERROR',
    message: `Invalid engine options: ${message}`,
    details,
  });
}

/**
 * Serialize an MlnError for JSON output
 */
export function serializeMlnError(error: MlnError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
