/**
 * Tiered Search Orchestrator
 *
 * One query end to end: validate, route, retrieve tier by tier, then prune the
 * accepted hits to the token budget.
 */

import type { ContextPruner } from "../processing/contextPruner";
import type { SemanticRouter } from "../routing/semanticRouter";
import type { TieredRetrievalEngine } from "../routing/tieredRetrieval";
import { createLogger } from "./logger";
import { parseQuery } from "./query";
import type { RetrievalOutcome, RoutingDecision, SearchQuery } from "./types";

const log = createLogger("Orchestrator");

export interface TieredSearchOptions {
  /** Cancels the session; the outcome is then "cancelled" */
  signal?: AbortSignal;

  /** Overrides the configured token budget for this query */
  tokenBudget?: number;
}

export interface OrchestratorResult {
  /** Validated query */
  query: SearchQuery;

  routing: RoutingDecision;

  /** Outcome with accepted hits already pruned */
  outcome: RetrievalOutcome;
}

export class TieredSearchOrchestrator {
  constructor(
    private readonly router: SemanticRouter,
    private readonly engine: TieredRetrievalEngine,
    private readonly pruner: ContextPruner,
    private readonly defaultTokenBudget: number,
  ) {}

  /**
   * Run a tiered search
   *
   * @param input query string or query object
   * @throws QueryValidationError before any backend is called
   * @throws BackendError("auth_failure") when a backend rejects credentials
   */
  async run(input: unknown, options: TieredSearchOptions = {}): Promise<OrchestratorResult> {
    const query = parseQuery(input);
    const routing = this.router.classify(query);
    log.debug(`Routed as ${routing.complexity}, starting at tier '${routing.startTier}'`);

    const outcome = await this.engine.retrieve(query, routing, { signal: options.signal });

    if (outcome.status !== "accepted") {
      return { query, routing, outcome };
    }

    const budget = options.tokenBudget ?? this.defaultTokenBudget;
    const hits = this.pruner.prune(outcome.hits, budget);
    if (hits.length < outcome.hits.length) {
      log.debug(`Pruned ${outcome.hits.length} hit(s) to ${hits.length} for ${budget} tokens`);
    }

    return { query, routing, outcome: { ...outcome, hits } };
  }
}
