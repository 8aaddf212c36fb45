import { test } from "node:test";
import assert from "node:assert/strict";
import { UnknownKeyIdError, VerificationError } from "./errors.js";
import { KeySet } from "./statement.js";
import { createTestKey, signStatement } from "./testUtils/federation.js";
import { createJoseVerifier } from "./verifier.js";

const keySetOf = (...jwks: Array<{ kty?: string; kid?: string; alg?: string; crv?: string; x?: string }>) =>
  new KeySet(
    jwks.map((jwk) => ({ kty: jwk.kty ?? "OKP", kid: jwk.kid, alg: jwk.alg, crv: jwk.crv, x: jwk.x }))
  );

test("verifier: accepts a token signed by the key its kid names", async () => {
  const key = await createTestKey("k1");
  const token = await signStatement(key, { sub: "https://leaf.example/" });
  const verifier = createJoseVerifier();
  await verifier.verify(token, keySetOf(key.publicJwk));
  assert.equal(verifier.decodeHeader(token).kid, "k1");
  assert.equal(verifier.decodePayload(token).sub, "https://leaf.example/");
});

test("verifier: unknown or absent kid names the available kids", async () => {
  const key = await createTestKey("k1");
  const verifier = createJoseVerifier();
  const other = await signStatement(key, { sub: "https://leaf.example/" }, { kid: "k9" });
  await assert.rejects(
    () => verifier.verify(other, keySetOf(key.publicJwk)),
    (error: unknown) =>
      error instanceof UnknownKeyIdError &&
      error.kid === "k9" &&
      error.availableKids.join(",") === "k1" &&
      error.message === 'kid "k9" not found in [k1]'
  );
  const anonymous = await signStatement(key, { sub: "https://leaf.example/" }, { omitKid: true });
  await assert.rejects(
    () => verifier.verify(anonymous, keySetOf(key.publicJwk)),
    (error: unknown) => error instanceof UnknownKeyIdError && error.kid === undefined
  );
});

test("verifier: a different key under the same kid fails verification", async () => {
  const signer = await createTestKey("k1");
  const published = await createTestKey("k1");
  const token = await signStatement(signer, { sub: "https://leaf.example/" });
  await assert.rejects(
    () => createJoseVerifier().verify(token, keySetOf(published.publicJwk)),
    (error: unknown) => error instanceof VerificationError && error.code === "signature_invalid"
  );
});

test("verifier: enforces the algorithm allow-list and expiry", async () => {
  const key = await createTestKey("k1");
  const token = await signStatement(key, { sub: "https://leaf.example/" });
  await assert.rejects(
    () => createJoseVerifier({ allowedAlgorithms: ["ES256"] }).verify(token, keySetOf(key.publicJwk)),
    (error: unknown) => error instanceof VerificationError && error.message === "alg EdDSA is not accepted"
  );

  const expired = await signStatement(key, {
    sub: "https://leaf.example/",
    exp: Math.floor(Date.now() / 1000) - 3600
  });
  await assert.rejects(
    () => createJoseVerifier().verify(expired, keySetOf(key.publicJwk)),
    (error: unknown) => error instanceof VerificationError
  );
});
