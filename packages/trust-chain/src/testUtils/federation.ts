import { SignJWT, exportJWK, generateKeyPair, type JWK, type JWTPayload, type KeyLike } from "jose";
import { createMetricsRegistry, type LogLevel, type LogMeta, type Logger } from "@trustwalk/shared";
import { entityConfigurationUrl, subordinateStatementUrl } from "../entityId.js";
import { FetchError } from "../errors.js";
import { createJoseVerifier } from "../verifier.js";
import type { DocumentFetcher, FederationContext, FetchOutcome } from "../types.js";

export type TestKey = {
  kid: string;
  privateKey: KeyLike;
  publicJwk: JWK;
};

export type TestEntity = {
  subject: string;
  key: TestKey;
  authorityHints?: string[];
  fetchEndpoint?: string;
};

export const createTestKey = async (kid: string): Promise<TestKey> => {
  const { privateKey, publicKey } = await generateKeyPair("EdDSA", { extractable: true });
  const publicJwk = await exportJWK(publicKey);
  publicJwk.kid = kid;
  publicJwk.alg = "EdDSA";
  return { kid, privateKey, publicJwk };
};

export const signStatement = async (
  key: TestKey,
  payload: JWTPayload,
  header: { kid?: string; omitKid?: boolean } = {}
) => {
  const jwt = new SignJWT(payload)
    .setProtectedHeader({
      alg: "EdDSA",
      typ: "entity-statement+jwt",
      ...(header.omitKid ? {} : { kid: header.kid ?? key.kid })
    })
    .setIssuedAt();
  if (payload.exp === undefined) {
    jwt.setExpirationTime("1h");
  }
  return jwt.sign(key.privateKey);
};

export const entityConfigurationToken = (entity: TestEntity, overrides: JWTPayload = {}) =>
  signStatement(entity.key, {
    iss: entity.subject,
    sub: entity.subject,
    jwks: { keys: [entity.key.publicJwk] },
    authority_hints: entity.authorityHints ?? [],
    ...(entity.fetchEndpoint
      ? { metadata: { federation_entity: { federation_api_endpoint: entity.fetchEndpoint } } }
      : {}),
    ...overrides
  });

export const subordinateStatementToken = (
  issuer: TestEntity,
  subject: TestEntity,
  overrides: JWTPayload = {}
) =>
  signStatement(issuer.key, {
    iss: issuer.subject,
    sub: subject.subject,
    jwks: { keys: [subject.key.publicJwk] },
    ...overrides
  });

export const createMemoryFetcher = () => {
  const documents = new Map<string, string>();
  const requests: string[][] = [];
  const fetcher: DocumentFetcher = {
    fetch: async (urls) => {
      requests.push([...urls]);
      return urls.map((url): FetchOutcome => {
        const body = documents.get(url);
        if (body === undefined) {
          return {
            url,
            ok: false,
            error: new FetchError(url, { status: 404, message: `${url} answered 404` })
          };
        }
        return { url, ok: true, body };
      });
    }
  };

  const publishConfiguration = (subject: string, token: string) => {
    documents.set(entityConfigurationUrl(subject), token);
  };

  const publishSubordinateStatement = (issuer: TestEntity, subject: string, token: string) => {
    if (!issuer.fetchEndpoint) {
      throw new Error(`${issuer.subject} has no fetch endpoint`);
    }
    documents.set(subordinateStatementUrl(issuer.fetchEndpoint, subject), token);
  };

  return { fetcher, requests, documents, publishConfiguration, publishSubordinateStatement };
};

export type LogRecord = { level: LogLevel; event: string; meta?: LogMeta };

export const createCapturingLogger = () => {
  const records: LogRecord[] = [];
  const logger: Logger = {
    info: (event, meta) => {
      records.push({ level: "info", event, meta });
    },
    warn: (event, meta) => {
      records.push({ level: "warn", event, meta });
    },
    error: (event, meta) => {
      records.push({ level: "error", event, meta });
    }
  };
  return { logger, records };
};

export const createTestContext = (
  fetcher: DocumentFetcher,
  overrides: Partial<FederationContext> = {}
): FederationContext => ({
  fetcher,
  verifier: createJoseVerifier(),
  fetchParams: { timeoutMs: 1000 },
  logger: createCapturingLogger().logger,
  metrics: createMetricsRegistry({ component: "trust-chain" }),
  filterByAllowedTrustMarks: [],
  ...overrides
});
