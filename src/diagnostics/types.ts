/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * An optimizer diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `O65001`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /**
   * Unknown/unclassified diagnostic.
   *
   * Use a more specific ID when possible; this remains for forward compatibility.
   */
  Unknown: 'O65000',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'O65001',

  /** Internal error while optimizing (unexpected exception). */
  InternalError: 'O65002',

  /** Unknown CPU, dialect or option value handed to the library entry point. */
  ConfigError: 'O65003',

  /** `#NOOPT` / `#OPT` directive toggled the optimization latch. */
  DirectiveToggle: 'O65100',

  /** A subroutine label has no discoverable terminating return before the next global label. */
  SubroutineUnbounded: 'O65200',

  /** A single-use subroutine body was inlined into its call site. */
  Inlined: 'O65201',

  /** The pass scheduler hit its iteration cap while passes were still making progress. */
  NonConvergence: 'O65300',

  /** Per-pass debug note (trace level 2). */
  PassTrace: 'O65301',

  /** Register/flag tracking summary from the validator. */
  ValidationSummary: 'O65400',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
