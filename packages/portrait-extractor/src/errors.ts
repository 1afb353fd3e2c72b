/**
 * Portrait Extraction Error Types
 *
 * Error Hierarchy:
 * - PortraitExtractionError (base)
 *   - DecodeError - input bytes are not a readable image
 *   - BackendUnavailableError - the face detector cannot run
 *   - InvalidOptionsError - request options out of range
 *
 * "No faces found" and "every crop degenerated" are result outcomes,
 * not errors. See ExtractionOutcome in pipeline.ts.
 */

export class PortraitExtractionError extends Error {
  readonly issueCode: string;
  readonly isExpected: boolean;

  constructor(
    message: string,
    issueCode: string,
    options?: { isExpected?: boolean; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "PortraitExtractionError";
    this.issueCode = issueCode;
    this.isExpected = options?.isExpected ?? false;
  }
}

export class DecodeError extends PortraitExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "decode_failed", { isExpected: true, cause: options?.cause });
    this.name = "DecodeError";
  }

  static unreadable(cause?: unknown): DecodeError {
    return new DecodeError("Input is not a decodable image", { cause });
  }

  static empty(): DecodeError {
    return new DecodeError("Input image is empty");
  }
}

export class BackendUnavailableError extends PortraitExtractionError {
  readonly backend: string;

  constructor(
    message: string,
    backend: string,
    options?: { cause?: unknown },
  ) {
    super(message, "backend_unavailable", {
      isExpected: false,
      cause: options?.cause,
    });
    this.name = "BackendUnavailableError";
    this.backend = backend;
  }

  static loadFailed(backend: string, cause?: unknown): BackendUnavailableError {
    return new BackendUnavailableError(
      `Face detection backend "${backend}" could not be loaded`,
      backend,
      { cause },
    );
  }

  static inferenceFailed(
    backend: string,
    cause?: unknown,
  ): BackendUnavailableError {
    return new BackendUnavailableError(
      `Face detection backend "${backend}" failed during inference`,
      backend,
      { cause },
    );
  }

  static noneConfigured(): BackendUnavailableError {
    return new BackendUnavailableError(
      "No face detection backend is available: install the Human models or set CASCADE_MODEL_PATH",
      "auto",
    );
  }
}

export class InvalidOptionsError extends PortraitExtractionError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid extraction options: ${issues.join("; ")}`, "invalid_options", {
      isExpected: true,
    });
    this.name = "InvalidOptionsError";
    this.issues = issues;
  }
}
