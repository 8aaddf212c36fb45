import { resolveFederationContext } from "./context.js";
import { entityConfigurationUrl, sameEntity, subordinateStatementUrl, withTrailingSlash } from "./entityId.js";
import {
  FederationError,
  FetchError,
  MalformedTokenError,
  StatementClaimsError,
  UnknownKeyIdError,
  UnsupportedFeatureError
} from "./errors.js";
import {
  EntityConfigurationPayloadSchema,
  SubordinateStatementPayloadSchema,
  federationApiEndpoint,
  keySetFromPayload,
  parseStatement,
  type EntityConfigurationPayload,
  type KeySet,
  type Statement
} from "./statement.js";
import type {
  FailedSuperior,
  FailedSuperiorStatement,
  FederationContext,
  FetchOutcome,
  UnreachableSuperior,
  ValidationState
} from "./types.js";

const toError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)));

const outcomesByUrl = (outcomes: FetchOutcome[]) => new Map(outcomes.map((outcome) => [outcome.url, outcome]));

/**
 * The self-issued statement of a federation entity, together with what has been
 * learned about its superiors while resolving it.
 *
 * An instance is owned by the resolution task that created it and becomes read-only
 * once that task is done with it.
 */
export class EntityConfiguration {
  readonly statement: Statement;
  readonly payload: EntityConfigurationPayload;
  readonly subject: string;
  readonly keySet: KeySet;
  readonly authorityHints: string[];
  isValid: ValidationState = "unvalidated";

  // Keyed by the subject each verified configuration declares; every per-superior
  // map below uses that same key. Failures are keyed by the hint that was followed.
  readonly verifiedSuperiors = new Map<string, EntityConfiguration>();
  readonly failedSuperiors = new Map<string, FailedSuperior>();
  // Verified superiors that publish no endpoint for subordinate statements.
  readonly unreachableSuperiors = new Map<string, UnreachableSuperior>();

  // Superior subject -> outcome of the bidirectional check.
  readonly verifiedBySuperiors = new Map<string, boolean>();
  readonly failedBySuperiors = new Map<string, FailedSuperiorStatement>();
  // Subordinate statements accepted by a successful bidirectional check.
  readonly superiorStatements = new Map<string, Statement>();

  private readonly context: FederationContext;

  constructor(statement: Statement, context: FederationContext) {
    const payload = EntityConfigurationPayloadSchema.safeParse(statement.payload);
    if (!payload.success) {
      throw new MalformedTokenError("entity configuration lacks iss/sub or has malformed authority_hints");
    }
    this.statement = statement;
    this.payload = payload.data;
    this.subject = payload.data.sub;
    this.authorityHints = payload.data.authority_hints;
    this.keySet = keySetFromPayload(statement.payload);
    this.context = context;
  }

  static fromToken(token: string, overrides: Partial<FederationContext> = {}) {
    return new EntityConfiguration(parseStatement(token), resolveFederationContext(overrides));
  }

  get expiresAt(): number | undefined {
    return this.payload.exp;
  }

  /**
   * Verifies the configuration against the keys it publishes itself.
   * Never returns false: any failure is thrown.
   */
  async validateSelf(): Promise<true> {
    try {
      if (this.payload.iss !== this.payload.sub) {
        throw new StatementClaimsError(
          `entity configuration of ${this.payload.sub} is issued by ${this.payload.iss}`
        );
      }
      const kid = this.statement.header.kid;
      if (!this.keySet.has(kid)) {
        throw new UnknownKeyIdError(kid, this.keySet.kids);
      }
      await this.context.verifier.verify(this.statement.rawToken, this.keySet);
    } catch (error) {
      this.isValid = "invalid";
      throw error;
    }
    this.isValid = "valid";
    return true;
  }

  /** Verifies a statement this entity issued about one of its subordinates. */
  async validateDescendantStatement(token: string): Promise<Statement> {
    const statement = parseStatement(token);
    const kid = statement.header.kid;
    if (!this.keySet.has(kid)) {
      throw new UnknownKeyIdError(kid, this.keySet.kids);
    }
    await this.context.verifier.verify(statement.rawToken, this.keySet);
    return statement;
  }

  /**
   * Checks a statement issued about this entity by `superior`: the superior must vouch
   * for it with its own keys, and the keys it vouches for must verify this entity's
   * configuration. Failures are recorded and reported as false; nothing is thrown, so
   * one misbehaving superior only fails its own edge.
   *
   * Outcomes are recorded under `superior.subject`. A statement whose `iss` names anyone
   * else fails, so the declared issuer can never reach another superior's records.
   */
  async validateBySuperiorStatement(token: string, superior: EntityConfiguration): Promise<boolean> {
    const issuer = superior.subject;
    let statement: Statement | undefined;
    try {
      statement = parseStatement(token);
      await superior.validateSelf();
      await superior.validateDescendantStatement(statement.rawToken);

      const claims = SubordinateStatementPayloadSchema.safeParse(statement.payload);
      if (!claims.success) {
        throw new MalformedTokenError("subordinate statement lacks iss or sub");
      }
      if (!sameEntity(claims.data.sub, this.subject)) {
        throw new StatementClaimsError(`statement describes ${claims.data.sub}, not ${this.subject}`);
      }
      if (!sameEntity(claims.data.iss, issuer)) {
        throw new StatementClaimsError(`statement is issued by ${claims.data.iss}, not ${issuer}`);
      }

      const vouchedKeys = keySetFromPayload(statement.payload);
      await this.context.verifier.verify(this.statement.rawToken, vouchedKeys);

      this.verifiedBySuperiors.set(issuer, true);
      this.failedBySuperiors.delete(issuer);
      this.superiorStatements.set(issuer, statement);
      this.context.metrics.incCounter("federation_cross_validation_total", { outcome: "verified" });
      return true;
    } catch (error) {
      this.recordFailedBySuperior({ issuer, error: toError(error), statement });
      return false;
    }
  }

  async getSuperiors(authorityHints: string[] = [], maxAuthorityHints = 0) {
    this.assertTrustMarkFilterUnsupported();
    const { fetcher, fetchParams, logger, metrics } = this.context;

    let hints = authorityHints.length ? authorityHints : this.authorityHints;
    if (maxAuthorityHints > 0 && hints.length > maxAuthorityHints) {
      logger.warn("federation.authority_hints_truncated", {
        subject: this.subject,
        found: hints.length,
        maxAuthorityHints,
        ignored: hints.slice(maxAuthorityHints)
      });
      hints = hints.slice(0, maxAuthorityHints);
    }
    const seen = new Set<string>();
    hints = hints.filter((hint) => {
      const key = withTrailingSlash(hint);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
    if (!hints.length) {
      return this.verifiedSuperiors;
    }

    const urls = hints.map(entityConfigurationUrl);
    for (const url of urls) {
      logger.info("federation.fetch_started", { kind: "entity_configuration", url });
    }
    metrics.incCounter("federation_fetch_total", { kind: "entity_configuration" }, urls.length);
    const outcomes = outcomesByUrl(await fetcher.fetch(urls, fetchParams));

    for (const [index, subject] of hints.entries()) {
      const url = urls[index];
      const outcome = outcomes.get(url);
      if (!outcome || !outcome.ok) {
        this.recordFailedSuperior({
          subject,
          url,
          error: outcome?.error ?? new FetchError(url, { message: `no outcome reported for ${url}` })
        });
        continue;
      }

      let superior: EntityConfiguration | undefined;
      try {
        superior = new EntityConfiguration(parseStatement(outcome.body), this.context);
        if (!sameEntity(superior.subject, subject)) {
          throw new StatementClaimsError(`${url} describes ${superior.subject}`);
        }
        await superior.validateSelf();
        this.failedSuperiors.delete(subject);
        this.failedSuperiors.delete(superior.subject);
        this.verifiedSuperiors.set(superior.subject, superior);
        metrics.incCounter("federation_superiors_total", { outcome: "verified" });
        logger.info("federation.superior_verified", { subject: this.subject, superior: superior.subject });
      } catch (error) {
        if (error instanceof UnsupportedFeatureError || !(error instanceof FederationError)) {
          throw error;
        }
        this.recordFailedSuperior({ subject, url, error, configuration: superior });
      }
    }
    return this.verifiedSuperiors;
  }

  async validateBySuperiors(superiors: Iterable<EntityConfiguration> = this.verifiedSuperiors.values()) {
    this.assertTrustMarkFilterUnsupported();
    const { fetcher, fetchParams, logger, metrics } = this.context;

    const reachable: Array<{ superior: EntityConfiguration; url: string }> = [];
    for (const superior of superiors) {
      const lookup = federationApiEndpoint(superior.statement.payload);
      if (!lookup.ok) {
        this.unreachableSuperiors.set(superior.subject, {
          subject: superior.subject,
          configuration: superior,
          reason: lookup.reason
        });
        this.verifiedBySuperiors.delete(superior.subject);
        metrics.incCounter("federation_superiors_total", { outcome: "unreachable" });
        logger.warn("federation.superior_unreachable", {
          subject: this.subject,
          superior: superior.subject,
          reason: lookup.reason
        });
        continue;
      }
      this.unreachableSuperiors.delete(superior.subject);
      reachable.push({ superior, url: subordinateStatementUrl(lookup.endpoint, this.subject) });
    }
    if (!reachable.length) {
      return this.verifiedBySuperiors;
    }

    const urls = reachable.map((entry) => entry.url);
    for (const url of urls) {
      logger.info("federation.fetch_started", { kind: "subordinate_statement", url });
    }
    metrics.incCounter("federation_fetch_total", { kind: "subordinate_statement" }, urls.length);
    const outcomes = outcomesByUrl(await fetcher.fetch(urls, fetchParams));

    for (const { superior, url } of reachable) {
      const outcome = outcomes.get(url);
      if (!outcome || !outcome.ok) {
        const error = outcome?.error ?? new FetchError(url, { message: `no outcome reported for ${url}` });
        metrics.incCounter("federation_fetch_failed_total", { code: error.code });
        this.recordFailedBySuperior({ issuer: superior.subject, error, url });
        continue;
      }
      await this.validateBySuperiorStatement(outcome.body, superior);
    }
    return this.verifiedBySuperiors;
  }

  getValidTrustMarks(): never {
    throw new UnsupportedFeatureError("trust_mark_filtering", "trust mark validation is not supported");
  }

  toString() {
    return `${this.subject} (${this.isValid})`;
  }

  private assertTrustMarkFilterUnsupported() {
    if (this.context.filterByAllowedTrustMarks.length > 0) {
      throw new UnsupportedFeatureError(
        "trust_mark_filtering",
        "filtering superiors by allowed trust marks is not supported"
      );
    }
  }

  private recordFailedSuperior(failure: FailedSuperior) {
    this.verifiedSuperiors.delete(failure.subject);
    const fetched = failure.configuration?.subject;
    if (fetched !== undefined && sameEntity(fetched, failure.subject)) {
      this.verifiedSuperiors.delete(fetched);
    }
    this.failedSuperiors.set(failure.subject, failure);
    if (failure.error instanceof FetchError) {
      this.context.metrics.incCounter("federation_fetch_failed_total", { code: failure.error.code });
    }
    this.context.metrics.incCounter("federation_superiors_total", { outcome: "failed" });
    this.context.logger.warn("federation.superior_failed", {
      subject: this.subject,
      superior: failure.subject,
      url: failure.url,
      error: failure.error
    });
  }

  private recordFailedBySuperior(failure: FailedSuperiorStatement) {
    this.verifiedBySuperiors.set(failure.issuer, false);
    this.superiorStatements.delete(failure.issuer);
    this.failedBySuperiors.set(failure.issuer, failure);
    this.context.metrics.incCounter("federation_cross_validation_total", { outcome: "failed" });
    this.context.logger.warn("federation.cross_validation_failed", {
      subject: this.subject,
      superior: failure.issuer,
      error: failure.error
    });
  }
}
