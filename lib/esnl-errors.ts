import { ErrorSpecific } from "./common-types";

export class EsnlError extends Error {
  constructor(
    message: string,
    public specifics: ErrorSpecific[] = [],
  ) {
    super(message);
    this.name = "EsnlError";
  }
}

export class ConfigurationError extends EsnlError {
  constructor(message: string, specifics: ErrorSpecific[] = []) {
    super(message, specifics);
    this.name = "ConfigurationError";
  }
}

export class InvalidAccessionError extends EsnlError {
  constructor(public readonly accession: string) {
    super(`'${accession}' is not a recognised assembly accession`, [
      { message: "Assembly accession not recognised", accession: accession },
    ]);
    this.name = "InvalidAccessionError";
  }
}

/**
 * The remote directory for an accession exists (or was computed) but
 * the sequence report could not be found/described within it.
 */
export class ReportNotFoundError extends EsnlError {
  constructor(
    public readonly accession: string,
    public readonly directory: string,
  ) {
    super(`No sequence report for ${accession} found in ${directory}`, [
      {
        message: "Sequence report not found",
        accession: accession,
        path: directory,
      },
    ]);
    this.name = "ReportNotFoundError";
  }
}

export class TransferError extends EsnlError {
  constructor(message: string, specifics: ErrorSpecific[] = []) {
    super(message, specifics);
    this.name = "TransferError";
  }
}

export class DownloadFailedError extends EsnlError {
  constructor(message: string, specifics: ErrorSpecific[] = []) {
    super(message, specifics);
    this.name = "DownloadFailedError";
  }
}

export class ReportParseError extends EsnlError {
  constructor(
    message: string,
    public readonly lineNumber?: number,
  ) {
    super(
      lineNumber !== undefined ? `${message} (line ${lineNumber})` : message,
      [{ message: message }],
    );
    this.name = "ReportParseError";
  }
}

export class OperationAbortedError extends EsnlError {
  constructor(message = "Operation aborted") {
    super(message);
    this.name = "OperationAbortedError";
  }
}

/**
 * Render any thrown value as a short string suitable for a log line.
 *
 * @param e
 */
export function describeError(e: unknown): string {
  if (e instanceof Error) return `${e.name}: ${e.message}`;
  return String(e);
}
