/**
 * Error taxonomy for configuration failures that abort a run.
 *
 * Per-probe failures (refused, timed out, unreachable, ping failed) are
 * outcomes, not errors, and never surface as a ScanError.
 */

export type ScanErrorCode =
  | "invalid_target_spec"        // Bad CIDR/IP literal, unreadable hosts file, selector misuse
  | "empty_target_spec"          // Target resolved to zero hosts
  | "invalid_port_spec"          // Token is not an integer or integer range
  | "empty_port_spec"            // No port in (0, 65535] left after parsing
  | "invalid_option"             // Timeout, worker count or similar out of range
  | "unsupported_output_format"  // Output extension is neither .csv nor .json
  | "output_write_failed";       // Result file could not be written

export class ScanError extends Error {
  constructor(
    public readonly code: ScanErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ScanError";
  }
}

export function isScanError(err: unknown): err is ScanError {
  return err instanceof ScanError;
}
