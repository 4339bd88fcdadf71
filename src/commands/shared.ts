import type { Ora } from "ora";
import { LookalikeError } from "../errors";

/**
 * Report a domain error through the spinner and mark the process as failed.
 * Anything that is not a LookalikeError is rethrown.
 */
export function failCommand(spinner: Ora, error: unknown): void {
  if (!(error instanceof LookalikeError)) {
    throw error;
  }
  spinner.fail(error.message);
  process.exitCode = 1;
}

export function formatDuration(ms: number | null): string {
  if (ms === null) return "-";
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}
