export type ErrorCode =
  | "VALIDATION"
  | "SCAN_CONFLICT"
  | "EMPTY_DATABASE"
  | "ORACLE_FAILURE"
  | "ROOT_UNAVAILABLE";

export class LookalikeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad input from the caller: root path, k, query vector, rejected upload. */
export class ValidationError extends LookalikeError {
  constructor(message: string) {
    super("VALIDATION", message);
  }
}

export class ScanConflictError extends LookalikeError {
  readonly runningJobId: number;

  constructor(runningJobId: number) {
    super("SCAN_CONFLICT", `Scan #${runningJobId} is still running`);
    this.runningJobId = runningJobId;
  }
}

export class EmptyDatabaseError extends LookalikeError {
  constructor() {
    super("EMPTY_DATABASE", "No identities with a face embedding. Run 'lookalike scan <path>' first.");
  }
}

/** The embedding oracle crashed on one image. Recorded per identity, never fatal to a scan. */
export class OracleFailure extends LookalikeError {
  constructor(message: string, cause?: unknown) {
    super("ORACLE_FAILURE", message, { cause });
  }
}

export class RootUnavailableError extends LookalikeError {
  readonly rootPath: string;

  constructor(rootPath: string, reason: string) {
    super("ROOT_UNAVAILABLE", `Root folder ${rootPath} became unavailable: ${reason}`);
    this.rootPath = rootPath;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
