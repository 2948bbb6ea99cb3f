/**
 * Shared type definitions for mln-bridge
 */

// Re-export error types
export {
    MlnException,
    createLookupError,
    createFormatError,
    createCollaboratorFailure,
    createInvalidProblemError,
    createNotSupportedError,
    createConfigError,
    serializeMlnError,
} from './errors.js';

export type {
    MlnErrorCode,
    MlnError,
} from './errors.js';

// Re-export engine options
export {
    DEFAULTS,
    ENV_KEYS,
    TuffyOptionsSchema,
    resolveTuffyOptions,
} from './options.js';

export type {
    LogSink,
    TuffyOptions,
    ResolvedTuffyOptions,
} from './options.js';
