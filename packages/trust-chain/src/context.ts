import { createHttpFetcher } from "./fetcher.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";
import { createJoseVerifier } from "./verifier.js";
import type { FederationContext } from "./types.js";

export const DEFAULT_FETCH_TIMEOUT_MS = 4000;

export const resolveFederationContext = (overrides: Partial<FederationContext> = {}): FederationContext => ({
  fetcher: overrides.fetcher ?? createHttpFetcher(),
  verifier: overrides.verifier ?? createJoseVerifier(),
  fetchParams: overrides.fetchParams ?? { timeoutMs: DEFAULT_FETCH_TIMEOUT_MS },
  logger: overrides.logger ?? log,
  metrics: overrides.metrics ?? metrics,
  filterByAllowedTrustMarks: overrides.filterByAllowedTrustMarks ?? []
});
