export type RoomprintErrorCode =
  | "state_misuse"
  | "persistence_read"
  | "persistence_write"
  | "scan_failed";

export class RoomprintError extends Error {
  constructor(readonly code: RoomprintErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CalibrationStateError extends RoomprintError {
  constructor(message: string) {
    super("state_misuse", message);
  }
}

export class PersistenceError extends RoomprintError {
  constructor(code: "persistence_read" | "persistence_write", message: string, cause?: unknown) {
    super(code, message, { cause });
  }
}

export class ScanError extends RoomprintError {
  constructor(message: string, cause?: unknown) {
    super("scan_failed", message, { cause });
  }
}
