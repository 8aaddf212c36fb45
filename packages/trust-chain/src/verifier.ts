import { importJWK, jwtVerify } from "jose";
import { UnknownKeyIdError, VerificationError } from "./errors.js";
import { parseStatement, type KeySet } from "./statement.js";
import type { SignatureVerifier } from "./types.js";

export const DEFAULT_ALLOWED_ALGORITHMS = [
  "RS256",
  "RS384",
  "RS512",
  "PS256",
  "PS384",
  "PS512",
  "ES256",
  "ES384",
  "ES512",
  "EdDSA"
];

export type JoseVerifierOptions = {
  allowedAlgorithms?: string[];
  clockToleranceSeconds?: number;
};

export const createJoseVerifier = (options: JoseVerifierOptions = {}): SignatureVerifier => {
  const allowedAlgorithms = new Set(options.allowedAlgorithms ?? DEFAULT_ALLOWED_ALGORITHMS);
  const clockTolerance = options.clockToleranceSeconds ?? 30;

  const verify = async (token: string, keySet: KeySet) => {
    const { header, rawToken } = parseStatement(token);
    const jwk = keySet.get(header.kid);
    if (!jwk) {
      throw new UnknownKeyIdError(header.kid, keySet.kids);
    }
    if (!allowedAlgorithms.has(header.alg)) {
      throw new VerificationError(`alg ${header.alg} is not accepted`);
    }
    if (jwk.alg && jwk.alg !== header.alg) {
      throw new VerificationError(`kid ${header.kid} is bound to ${jwk.alg}, token uses ${header.alg}`);
    }
    try {
      const key = await importJWK(jwk, header.alg);
      // exp and nbf are enforced when present.
      await jwtVerify(rawToken, key, { algorithms: [header.alg], clockTolerance });
    } catch (error) {
      throw new VerificationError(`token signed with kid ${header.kid} failed verification`, {
        cause: error
      });
    }
  };

  return {
    decodeHeader: (token) => parseStatement(token).header,
    decodePayload: (token) => parseStatement(token).payload,
    verify
  };
};
