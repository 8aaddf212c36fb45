import { resolveFederationContext } from "./context.js";
import { EntityConfiguration } from "./entityConfiguration.js";
import { sameEntity, withTrailingSlash } from "./entityId.js";
import { TrustChainCycleError, UnsupportedFeatureError } from "./errors.js";
import type { Statement, StatementPayload } from "./statement.js";
import type { FederationContext } from "./types.js";

export type NodeTermination = "trust_anchor" | "no_authority_hints" | "max_path_length" | "expanded";

export type TrustChainNode = {
  configuration: EntityConfiguration;
  // Hops from the leaf.
  depth: number;
  termination: NodeTermination;
  superiors: TrustChainNode[];
};

export type TrustChain = {
  subject: string;
  trustAnchor: string;
  entities: EntityConfiguration[];
  // Leaf configuration, one subordinate statement per hop, then the anchor's configuration.
  statements: string[];
  expiresAt?: number;
};

export type TrustChainResolution = {
  leaf: EntityConfiguration;
  tree: TrustChainNode;
  chains: TrustChain[];
};

export type TrustChainResolverOptions = Partial<FederationContext> & {
  trustAnchors?: string[];
  maxAuthorityHints?: number;
  maxPathLength?: number;
};

export const DEFAULT_MAX_PATH_LENGTH = 8;

const numericExp = (payload: StatementPayload) =>
  typeof payload.exp === "number" ? payload.exp : undefined;

export const createTrustChainResolver = (options: TrustChainResolverOptions = {}) => {
  const context = resolveFederationContext(options);
  const trustAnchors = new Set((options.trustAnchors ?? []).map(withTrailingSlash));
  const maxAuthorityHints = options.maxAuthorityHints ?? 0;
  const maxPathLength = options.maxPathLength ?? DEFAULT_MAX_PATH_LENGTH;

  const isTrustAnchor = (subject: string) => trustAnchors.has(withTrailingSlash(subject));

  const hintsToFollow = (configuration: EntityConfiguration) =>
    maxAuthorityHints > 0
      ? configuration.authorityHints.slice(0, maxAuthorityHints)
      : configuration.authorityHints;

  const walk = async (
    configuration: EntityConfiguration,
    path: string[],
    depth: number
  ): Promise<TrustChainNode> => {
    const node = (termination: NodeTermination, superiors: TrustChainNode[] = []): TrustChainNode => ({
      configuration,
      depth,
      termination,
      superiors
    });
    if (isTrustAnchor(configuration.subject)) return node("trust_anchor");
    const hints = hintsToFollow(configuration);
    if (!hints.length) return node("no_authority_hints");
    if (depth >= maxPathLength) return node("max_path_length");

    const revisited = hints.find((hint) => path.some((subject) => sameEntity(subject, hint)));
    if (revisited !== undefined) {
      throw new TrustChainCycleError([...path, revisited]);
    }

    await configuration.getSuperiors([], maxAuthorityHints);
    await configuration.validateBySuperiors();

    const superiors: TrustChainNode[] = [];
    for (const superior of configuration.verifiedSuperiors.values()) {
      superiors.push(await walk(superior, [...path, superior.subject], depth + 1));
    }
    return node("expanded", superiors);
  };

  const collectChains = (tree: TrustChainNode): TrustChain[] => {
    const chains: TrustChain[] = [];
    const visit = (node: TrustChainNode, trail: EntityConfiguration[], statements: Statement[]) => {
      const entities = [...trail, node.configuration];
      if (node.termination === "trust_anchor" || node.termination === "no_authority_hints") {
        const anchor = node.configuration;
        if (trustAnchors.size > 0 && !isTrustAnchor(anchor.subject)) return;
        const chainStatements = entities.length > 1 ? [...statements, anchor.statement] : statements;
        const expiries = chainStatements
          .map((statement) => numericExp(statement.payload))
          .filter((value): value is number => value !== undefined);
        chains.push({
          subject: tree.configuration.subject,
          trustAnchor: anchor.subject,
          entities,
          statements: chainStatements.map((statement) => statement.rawToken),
          expiresAt: expiries.length ? Math.min(...expiries) : undefined
        });
        return;
      }
      for (const superior of node.superiors) {
        const subject = superior.configuration.subject;
        const statement = node.configuration.superiorStatements.get(subject);
        if (node.configuration.verifiedBySuperiors.get(subject) !== true || !statement) continue;
        visit(superior, entities, [...statements, statement]);
      }
    };
    visit(tree, [], [tree.configuration.statement]);
    return chains;
  };

  const resolveFrom = async (leaf: EntityConfiguration): Promise<TrustChainResolution> => {
    if (context.filterByAllowedTrustMarks.length > 0) {
      throw new UnsupportedFeatureError(
        "trust_mark_filtering",
        "filtering superiors by allowed trust marks is not supported"
      );
    }
    await leaf.validateSelf();
    const tree = await walk(leaf, [leaf.subject], 0);
    const chains = collectChains(tree);
    context.metrics.incCounter("federation_chains_total", {}, chains.length);
    context.logger.info("federation.trust_chain_resolved", {
      subject: leaf.subject,
      chains: chains.length,
      trustAnchors: chains.map((chain) => chain.trustAnchor)
    });
    return { leaf, tree, chains };
  };

  return {
    resolveFrom,
    resolve: (token: string) => resolveFrom(EntityConfiguration.fromToken(token, context))
  };
};

export type TrustChainResolver = ReturnType<typeof createTrustChainResolver>;
