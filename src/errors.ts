export type ErrorCode =
  | "REFERENCE_PARSE"
  | "INVALID_VERSION_FORMAT"
  | "MISSING_CREDENTIAL"
  | "AUTH_TOKEN_MISSING"
  | "REGISTRY_REQUEST_FAILED";

export class ImageCheckError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ReferenceParseError extends ImageCheckError {
  readonly reference: string;

  constructor(reference: string, reason: string) {
    super("REFERENCE_PARSE", `${reason}: ${reference}`);
    this.reference = reference;
  }
}

export class InvalidVersionFormat extends ImageCheckError {
  readonly tag: string;

  constructor(tag: string, reason: string) {
    super("INVALID_VERSION_FORMAT", `Invalid semantic version "${tag}": ${reason}`);
    this.tag = tag;
  }
}

export class MissingCredential extends ImageCheckError {
  readonly registry: string;

  constructor(registry: string, hint: string) {
    super("MISSING_CREDENTIAL", `Registry ${registry} requires a token: ${hint}`);
    this.registry = registry;
  }
}

export class AuthTokenMissing extends ImageCheckError {
  readonly url: string;

  constructor(url: string) {
    super("AUTH_TOKEN_MISSING", `Token not found in response from ${url}`);
    this.url = url;
  }
}

export class RegistryRequestFailed extends ImageCheckError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, status: number | null, detail: string, options?: { cause?: unknown }) {
    super(
      "REGISTRY_REQUEST_FAILED",
      status === null ? `Request to ${url} failed: ${detail}` : `Request to ${url} failed with ${status}: ${detail}`,
      options
    );
    this.url = url;
    this.status = status;
  }
}

export const errorMessage = (err: unknown) => {
  return err instanceof Error ? err.message : String(err);
};
