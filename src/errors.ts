/**
 * Error taxonomy for EPUB handling. Every error raised by this library
 * extends {@link EpubError}, so callers can catch the whole family at once.
 */

export class EpubError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EpubError';
  }
}

/** Why an archive could not be read */
export type IoErrorReason = 'NOT_FOUND' | 'NOT_A_ZIP' | 'INCONSISTENT' | 'PERMISSION' | 'UNKNOWN';

/**
 * Error thrown when the EPUB file cannot be opened or is not a readable zip archive
 */
export class IoError extends EpubError {
  readonly reason: IoErrorReason;
  readonly code?: string;

  constructor(message: string, reason: IoErrorReason, code?: string) {
    super(message);
    this.name = 'IoError';
    this.reason = reason;
    this.code = code;
  }
}

/**
 * Error thrown when a required part of the EPUB is missing or does not
 * reference what it should (container, manifest, spine, toc)
 */
export class StructureError extends EpubError {
  constructor(message: string) {
    super(message);
    this.name = 'StructureError';
  }
}

/**
 * Error thrown when a requested element or fragment does not exist
 */
export class NotFoundError extends EpubError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown for arguments the caller should have checked
 */
export class InvalidInputError extends EpubError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Error thrown on programmer mistakes such as an unknown namespace prefix
 */
export class ConfigurationError extends EpubError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
