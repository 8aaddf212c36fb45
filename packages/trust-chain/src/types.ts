import type { Logger, MetricsRegistry } from "@trustwalk/shared";
import type { FederationError, FetchError } from "./errors.js";
import type { EntityConfiguration } from "./entityConfiguration.js";
import type { KeySet, Statement, StatementHeader, StatementPayload } from "./statement.js";

export type FetchParams = {
  // Deadline for the whole batch; members still pending when it elapses fail with fetch_timeout.
  timeoutMs: number;
  maxResponseBytes?: number;
  signal?: AbortSignal;
};

export type FetchOutcome =
  | { url: string; ok: true; body: string }
  | { url: string; ok: false; error: FetchError };

export type DocumentFetcher = {
  fetch: (urls: string[], params: FetchParams) => Promise<FetchOutcome[]>;
};

export type SignatureVerifier = {
  decodeHeader: (token: string) => StatementHeader;
  decodePayload: (token: string) => StatementPayload;
  // Resolves the token's kid in keySet and verifies the signature with that key.
  verify: (token: string, keySet: KeySet) => Promise<void>;
};

export type FederationContext = {
  fetcher: DocumentFetcher;
  verifier: SignatureVerifier;
  fetchParams: FetchParams;
  logger: Logger;
  metrics: MetricsRegistry;
  filterByAllowedTrustMarks: string[];
};

export type ValidationState = "unvalidated" | "valid" | "invalid";

export type FailedSuperior = {
  subject: string;
  url: string;
  error: FederationError;
  configuration?: EntityConfiguration;
};

export type UnreachableSuperior = {
  subject: string;
  configuration: EntityConfiguration;
  reason:
    | "federation_entity_metadata_missing"
    | "federation_api_endpoint_missing"
    | "federation_api_endpoint_invalid";
};

export type FailedSuperiorStatement = {
  issuer: string;
  error: FederationError | Error;
  url?: string;
  statement?: Statement;
};
