export type {
  DocumentFetcher,
  FailedSuperior,
  FailedSuperiorStatement,
  FederationContext,
  FetchOutcome,
  FetchParams,
  SignatureVerifier,
  UnreachableSuperior,
  ValidationState
} from "./types.js";
export type {
  EntityConfigurationPayload,
  FetchEndpointLookup,
  Jwk,
  Statement,
  StatementHeader,
  StatementPayload
} from "./statement.js";
export type {
  NodeTermination,
  TrustChain,
  TrustChainNode,
  TrustChainResolution,
  TrustChainResolver,
  TrustChainResolverOptions
} from "./trustChain.js";
export type { FederationConfig } from "./config.js";
export type { FederationErrorCode, UnsupportedFeature } from "./errors.js";
export {
  FederationError,
  FetchError,
  MalformedTokenError,
  StatementClaimsError,
  TrustChainCycleError,
  UnknownKeyIdError,
  UnsupportedFeatureError,
  VerificationError
} from "./errors.js";
export { KeySet, federationApiEndpoint, keySetFromPayload, parseStatement } from "./statement.js";
export {
  OIDCFED_WELL_KNOWN_PATH,
  entityConfigurationUrl,
  sameEntity,
  subordinateStatementUrl
} from "./entityId.js";
export { EntityConfiguration } from "./entityConfiguration.js";
export { createHttpFetcher, ENTITY_STATEMENT_CONTENT_TYPE } from "./fetcher.js";
export { createJoseVerifier, DEFAULT_ALLOWED_ALGORITHMS } from "./verifier.js";
export { resolveFederationContext } from "./context.js";
export { createTrustChainResolver, DEFAULT_MAX_PATH_LENGTH } from "./trustChain.js";
export { createFederationResolver, loadFederationConfig, parseFederationConfig } from "./config.js";
