import { decodeJwt, decodeProtectedHeader } from "jose";
import { z } from "zod";
import { MalformedTokenError, UnsupportedFeatureError } from "./errors.js";

export type Jwk = {
  kty: string;
  kid?: string;
  alg?: string;
  use?: string;
  crv?: string;
  x?: string;
  y?: string;
  n?: string;
  e?: string;
  x5c?: string[];
};

// Public members only: private JWK members never make it into a key set.
const JwkSchema: z.ZodType<Jwk> = z.object({
  kty: z.string().min(1),
  kid: z.string().min(1).optional(),
  alg: z.string().min(1).optional(),
  use: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  x5c: z.array(z.string()).optional()
});

const JwksSchema = z.object({
  keys: z.array(JwkSchema)
});

const StatementHeaderSchema = z
  .object({
    alg: z.string().min(1),
    kid: z.string().min(1).optional(),
    typ: z.string().optional()
  })
  .passthrough();

export type StatementHeader = z.infer<typeof StatementHeaderSchema>;
export type StatementPayload = Record<string, unknown>;

export type Statement = {
  header: StatementHeader;
  payload: StatementPayload;
  rawToken: string;
};

export const EntityConfigurationPayloadSchema = z
  .object({
    iss: z.string().min(1),
    sub: z.string().min(1),
    iat: z.number().optional(),
    exp: z.number().optional(),
    authority_hints: z.array(z.string().min(1)).default([]),
    metadata: z.record(z.string(), z.unknown()).optional(),
    trust_marks: z.array(z.unknown()).optional()
  })
  .passthrough();

export type EntityConfigurationPayload = z.infer<typeof EntityConfigurationPayloadSchema>;

export const SubordinateStatementPayloadSchema = z
  .object({
    iss: z.string().min(1),
    sub: z.string().min(1),
    exp: z.number().optional()
  })
  .passthrough();

export class KeySet {
  readonly keys: readonly Jwk[];
  private readonly byKid = new Map<string, Jwk>();

  constructor(keys: Jwk[]) {
    for (const key of keys) {
      if (!key.kid) continue;
      if (this.byKid.has(key.kid)) {
        throw new MalformedTokenError(`jwks declares kid ${JSON.stringify(key.kid)} twice`);
      }
      this.byKid.set(key.kid, key);
    }
    this.keys = [...keys];
  }

  get kids(): string[] {
    return Array.from(this.byKid.keys());
  }

  get(kid: string | undefined): Jwk | undefined {
    return kid === undefined ? undefined : this.byKid.get(kid);
  }

  has(kid: string | undefined): boolean {
    return this.get(kid) !== undefined;
  }
}

export const parseStatement = (token: string): Statement => {
  const rawToken = token.trim();
  if (rawToken.split(".").length !== 3) {
    throw new MalformedTokenError("token is not a compact JWS");
  }
  let rawHeader: unknown;
  let payload: StatementPayload;
  try {
    rawHeader = decodeProtectedHeader(rawToken);
    payload = decodeJwt(rawToken);
  } catch (error) {
    throw new MalformedTokenError("token header or payload is not a JSON object", { cause: error });
  }
  const header = StatementHeaderSchema.safeParse(rawHeader);
  if (!header.success) {
    throw new MalformedTokenError("token header does not name an alg");
  }
  return { header: header.data, payload, rawToken };
};

export const keySetFromPayload = (payload: StatementPayload): KeySet => {
  if (payload.jwks !== undefined) {
    const parsed = JwksSchema.safeParse(payload.jwks);
    if (!parsed.success) {
      throw new MalformedTokenError("jwks claim is not a JWK set");
    }
    return new KeySet(parsed.data.keys);
  }
  if (typeof payload.jwks_uri === "string" || typeof payload.signed_jwks_uri === "string") {
    throw new UnsupportedFeatureError(
      "remote_jwks",
      "key sets published by URI are not fetched; embed them in the jwks claim"
    );
  }
  throw new MalformedTokenError("payload carries no jwks claim");
};

const FederationEntityMetadataSchema = z.object({
  metadata: z.object({
    federation_entity: z
      .object({
        federation_api_endpoint: z.unknown().optional(),
        federation_fetch_endpoint: z.unknown().optional()
      })
      .passthrough()
  })
});

export type FetchEndpointLookup =
  | { ok: true; endpoint: string }
  | {
      ok: false;
      reason:
        | "federation_entity_metadata_missing"
        | "federation_api_endpoint_missing"
        | "federation_api_endpoint_invalid";
    };

const isHttpUrl = (value: string) => {
  try {
    const url = new URL(value);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
};

export const federationApiEndpoint = (payload: StatementPayload): FetchEndpointLookup => {
  const parsed = FederationEntityMetadataSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, reason: "federation_entity_metadata_missing" };
  }
  const entity = parsed.data.metadata.federation_entity;
  const endpoint = entity.federation_api_endpoint ?? entity.federation_fetch_endpoint;
  if (endpoint === undefined || endpoint === null || endpoint === "") {
    return { ok: false, reason: "federation_api_endpoint_missing" };
  }
  if (typeof endpoint !== "string" || !isHttpUrl(endpoint)) {
    return { ok: false, reason: "federation_api_endpoint_invalid" };
  }
  return { ok: true, endpoint };
};
