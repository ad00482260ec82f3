/**
 * Shared constants used across the git-fad codebase.
 */

// ============================================================================
// CLI Identity
// ============================================================================

/** CLI name, as printed in help and usage text */
export const NAME = 'git-fad'

/** Current CLI version */
export const VERSION = '0.1.0'

// ============================================================================
// Environment
// ============================================================================

/** Environment variable overriding the log level (`debug`, `info`, `warn`, `error`) */
export const LOG_LEVEL_ENV = 'GIT_FAD_LOG_LEVEL'
