// Log store related configuration
export const LOG_CONFIG = {
  // maximum number of entries kept in the log store (oldest dropped first)
  MAX_ENTRIES: 200,
};

// Argument engine related configuration
export const ARGS_CONFIG: {
  HELP_FLAGS: readonly string[];
  VERSION_FLAGS: readonly string[];
  NUMERIC_PRECEDENCE: 'short' | 'numeric';
  TRACE: boolean;
} = {
  // spellings that short-circuit a parse with a help request
  HELP_FLAGS: ['--help'],
  // spellings that short-circuit a parse with a version request
  VERSION_FLAGS: ['--version'],
  // which reading wins for "-5" when a digit short option and a numeric binding both fit
  NUMERIC_PRECEDENCE: 'short',
  // log every token, event and allocation to the log store
  TRACE: false,
};
