import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";
import { createHttpFetcher, type HttpFetcherOptions } from "./fetcher.js";
import { createTrustChainResolver, DEFAULT_MAX_PATH_LENGTH } from "./trustChain.js";
import type { FederationContext } from "./types.js";
import { createJoseVerifier, DEFAULT_ALLOWED_ALGORITHMS } from "./verifier.js";

const toNumber = (fallback: number) => (value: unknown) => {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const clampNumber = (fallback: number, min: number, max: number) => (value: unknown) => {
  const parsed = toNumber(fallback)(value);
  return Math.max(min, Math.min(max, parsed));
};

const toList = (fallback: string[]) => (value: unknown) => {
  if (typeof value !== "string" || value.trim() === "") {
    return fallback;
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
};

const envSchema = z.object({
  FEDERATION_HTTP_TIMEOUT_MS: z.preprocess(
    clampNumber(4000, 250, 30000),
    z.number().int().min(250).max(30000)
  ),
  FEDERATION_HTTP_MAX_RESPONSE_BYTES: z.preprocess(
    clampNumber(65536, 1024, 1048576),
    z.number().int().min(1024).max(1048576)
  ),
  FEDERATION_MAX_AUTHORITY_HINTS: z.preprocess(clampNumber(0, 0, 64), z.number().int().min(0).max(64)),
  FEDERATION_MAX_PATH_LENGTH: z.preprocess(
    clampNumber(DEFAULT_MAX_PATH_LENGTH, 1, 32),
    z.number().int().min(1).max(32)
  ),
  FEDERATION_TRUST_ANCHORS: z.preprocess(toList([]), z.array(z.string().url())),
  FEDERATION_ALLOWED_ALGORITHMS: z.preprocess(
    toList(DEFAULT_ALLOWED_ALGORITHMS),
    z.array(z.string().min(1)).min(1)
  ),
  FEDERATION_ALLOWED_TRUST_MARKS: z.preprocess(toList([]), z.array(z.string().min(1)))
});

export type FederationConfig = z.infer<typeof envSchema>;

export const parseFederationConfig = (env: Record<string, string | undefined>): FederationConfig =>
  envSchema.parse(env);

export const loadFederationConfig = (envPath = path.resolve(process.cwd(), ".env")) => {
  dotenv.config({ path: envPath });
  return parseFederationConfig(process.env);
};

export const createFederationResolver = (
  config: FederationConfig,
  overrides: Partial<FederationContext> & HttpFetcherOptions = {}
) =>
  createTrustChainResolver({
    fetcher: overrides.fetcher ?? createHttpFetcher({ fetchImpl: overrides.fetchImpl }),
    verifier: overrides.verifier ?? createJoseVerifier({ allowedAlgorithms: config.FEDERATION_ALLOWED_ALGORITHMS }),
    fetchParams: overrides.fetchParams ?? {
      timeoutMs: config.FEDERATION_HTTP_TIMEOUT_MS,
      maxResponseBytes: config.FEDERATION_HTTP_MAX_RESPONSE_BYTES
    },
    logger: overrides.logger,
    metrics: overrides.metrics,
    filterByAllowedTrustMarks: config.FEDERATION_ALLOWED_TRUST_MARKS,
    trustAnchors: config.FEDERATION_TRUST_ANCHORS,
    maxAuthorityHints: config.FEDERATION_MAX_AUTHORITY_HINTS,
    maxPathLength: config.FEDERATION_MAX_PATH_LENGTH
  });
