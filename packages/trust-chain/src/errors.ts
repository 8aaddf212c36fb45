export type FederationErrorCode =
  | "malformed_token"
  | "unknown_kid"
  | "signature_invalid"
  | "statement_claims_invalid"
  | "fetch_failed"
  | "fetch_timeout"
  | "unsupported_feature"
  | "trust_chain_cycle";

export class FederationError extends Error {
  readonly code: FederationErrorCode;

  constructor(code: FederationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MalformedTokenError extends FederationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("malformed_token", message, options);
  }
}

export class UnknownKeyIdError extends FederationError {
  readonly kid: string | undefined;
  readonly availableKids: string[];

  constructor(kid: string | undefined, availableKids: string[]) {
    super(
      "unknown_kid",
      `kid ${kid === undefined ? "(none)" : JSON.stringify(kid)} not found in [${availableKids.join(", ")}]`
    );
    this.kid = kid;
    this.availableKids = availableKids;
  }
}

export class VerificationError extends FederationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("signature_invalid", message, options);
  }
}

export class StatementClaimsError extends FederationError {
  constructor(message: string) {
    super("statement_claims_invalid", message);
  }
}

export class FetchError extends FederationError {
  readonly url: string;
  readonly status?: number;

  constructor(
    url: string,
    input: { timeout?: boolean; status?: number; message?: string; cause?: unknown } = {}
  ) {
    super(
      input.timeout ? "fetch_timeout" : "fetch_failed",
      input.message ?? (input.timeout ? `timed out fetching ${url}` : `failed to fetch ${url}`),
      { cause: input.cause }
    );
    this.url = url;
    this.status = input.status;
  }
}

export type UnsupportedFeature = "trust_mark_filtering" | "remote_jwks";

export class UnsupportedFeatureError extends FederationError {
  readonly feature: UnsupportedFeature;

  constructor(feature: UnsupportedFeature, message: string) {
    super("unsupported_feature", message);
    this.feature = feature;
  }
}

export class TrustChainCycleError extends FederationError {
  readonly path: string[];

  constructor(path: string[]) {
    super("trust_chain_cycle", `authority hints loop back: ${path.join(" -> ")}`);
    this.path = path;
  }
}
