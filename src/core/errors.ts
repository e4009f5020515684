/**
 * Error types for the renamer.
 * Per-file problems (no name found, a rejected generated name) are reported as
 * outcomes instead; these classes cover failures a caller has to catch.
 */

export type ExtractionFailure = "corrupt" | "encrypted" | "unreadable";

export class RenamerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RenamerError";
  }
}

export class ConfigurationError extends RenamerError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ExtractionError extends RenamerError {
  constructor(
    message: string,
    public readonly kind: ExtractionFailure,
    public readonly file: string,
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

export class FolderNotFoundError extends RenamerError {
  constructor(public readonly folder: string) {
    super(`Folder not found at '${folder}'`);
    this.name = "FolderNotFoundError";
  }
}

export class RenameError extends RenamerError {
  constructor(
    message: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super(message);
    this.name = "RenameError";
  }
}

export class MoveError extends RenamerError {
  constructor(message: string) {
    super(message);
    this.name = "MoveError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
