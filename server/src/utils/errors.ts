/**
 * Errors raised by the upload core. Each carries the HTTP status the
 * server answers with; anything that is not an UploadError becomes a 500.
 */
export class UploadError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number) {
    super(message);
    this.name = "UploadError";
    this.code = code;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, UploadError.prototype);
  }
}

/**
 * Malformed or contractually invalid input. Always user-correctable.
 */
export class BadRequestError extends UploadError {
  constructor(message: string, code: string = "BadRequest") {
    super(message, code, 400);
    this.name = "BadRequestError";
    Object.setPrototypeOf(this, BadRequestError.prototype);
  }
}

export class InvalidStateError extends BadRequestError {
  public readonly status: string;

  constructor(status: "complete" | "failed") {
    super(`Upload has already been marked as "${status}"`, "InvalidState");
    this.name = "InvalidStateError";
    this.status = status;
    Object.setPrototypeOf(this, InvalidStateError.prototype);
  }
}

export class OffsetMismatchError extends BadRequestError {
  public readonly expected: number;
  public readonly got: number;

  constructor(expected: number, got: number) {
    super(`Offsets do not match "${expected}"`, "OffsetMismatch");
    this.name = "OffsetMismatchError";
    this.expected = expected;
    this.got = got;
    Object.setPrototypeOf(this, OffsetMismatchError.prototype);
  }
}

export class InvalidChunkError extends BadRequestError {
  constructor(expectedLength: number, actualLength: number) {
    super(
      `Chunk size ${actualLength} does not match Content-Range length ${expectedLength}`,
      "InvalidChunk",
    );
    this.name = "InvalidChunkError";
    Object.setPrototypeOf(this, InvalidChunkError.prototype);
  }
}

export class ChecksumMismatchError extends BadRequestError {
  constructor(algorithm: string) {
    super(`${algorithm} checksum does not match`, "ChecksumMismatch");
    this.name = "ChecksumMismatchError";
    Object.setPrototypeOf(this, ChecksumMismatchError.prototype);
  }
}

/**
 * The upload outlived its expiration window. The client has to start over.
 */
export class GoneError extends UploadError {
  constructor(message: string = "Upload has expired") {
    super(message, "Gone", 410);
    this.name = "GoneError";
    Object.setPrototypeOf(this, GoneError.prototype);
  }
}
