/**
 * CLI-specific type definitions
 */

export type OutputFormat = 'json' | 'table';

/**
 * Where command output goes. Defaults to stdout/stderr in the binary.
 */
export interface CliIO {
  write(text: string): void;
  /** Called with any error a command throws; the binary exits non-zero */
  onError(error: unknown): void;
}
