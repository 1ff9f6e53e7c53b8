/**
 * Application Errors
 *
 * Thrown by services, caught by the error handler and rendered as
 * { error: { code, message } } with the carried HTTP status.
 */

import type { ContentfulStatusCode } from 'hono/utils/http-status';

export class AppError extends Error {
  constructor(
    readonly status: ContentfulStatusCode,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** A business rule rejected the request (duplicates, bad input). */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(400, 'BAD_REQUEST', message);
    this.name = 'BadRequestError';
  }
}

/** No session, or the session no longer exists. */
export class NotLoggedInError extends AppError {
  constructor(message = 'User not logged in') {
    super(401, 'UNAUTHENTICATED', message);
    this.name = 'NotLoggedInError';
  }
}

/** Logged in, but lacking the permission for the action. */
export class UnauthorizedActionError extends AppError {
  constructor(message: string) {
    super(401, 'UNAUTHORIZED', message);
    this.name = 'UnauthorizedActionError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, 'CONFLICT', message);
    this.name = 'ConflictError';
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string) {
    super(413, 'PAYLOAD_TOO_LARGE', message);
    this.name = 'PayloadTooLargeError';
  }
}

export class IllegalFileTypeError extends AppError {
  constructor(message = 'Illegal file type') {
    super(422, 'UNPROCESSABLE_ENTITY', message);
    this.name = 'IllegalFileTypeError';
  }
}

/** Writing to media storage failed. */
export class StorageError extends AppError {
  constructor(message = 'Unable to save file', options?: { cause?: unknown }) {
    super(500, 'STORAGE_ERROR', message);
    this.name = 'StorageError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** Chunk metadata on disk is unreadable or malformed. */
export class UploadMetadataError extends AppError {
  constructor(message = 'Error processing upload metadata') {
    super(500, 'UPLOAD_METADATA_ERROR', message);
    this.name = 'UploadMetadataError';
  }
}

/** Staged chunks could not be read back into one file. */
export class MergeError extends AppError {
  constructor(uploadId: string, options?: { cause?: unknown }) {
    super(500, 'MERGE_ERROR', `Unable to merge chunks of upload '${uploadId}'`);
    this.name = 'MergeError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
