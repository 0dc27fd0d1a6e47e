/**
 * Error classes raised by the import pipeline
 */

/** The upload could not be classified or mapped; no job was created */
export class ImportFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ImportFormatError";
  }
}

/** A field mapping referenced an unknown token or repeated a single-valued field */
export class MappingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MappingError";
  }
}

/** The requested operation is not valid for the job's current status */
export class ImportStateError extends Error {
  constructor(
    message: string,
    readonly status: string
  ) {
    super(message);
    this.name = "ImportStateError";
  }
}

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Import job not found: ${jobId}`);
    this.name = "JobNotFoundError";
  }
}

/** The catalog refused a create that was not a duplicate */
export class CatalogRejectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogRejectedError";
  }
}

/** Book match resolutions that do not cover or fit the pending groups */
export class InvalidResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidResolutionError";
  }
}
