/**
 * Service Keys for Dependency Injection Container
 *
 * Centralized constants for all service identifiers used with the DI container.
 * Using constants instead of magic strings prevents typos and enables IDE support.
 *
 * @example
 * ```typescript
 * import { ServiceKeys } from '../core/serviceKeys';
 *
 * // Register service
 * container.singleton(ServiceKeys.CONFIG, () => config);
 *
 * // Resolve service
 * const config = container.get<TieredSearchConfig>(ServiceKeys.CONFIG);
 * ```
 */

/**
 * All service keys used in the DI container
 */
export const ServiceKeys = {
  /** Application configuration */
  CONFIG: "config",

  /** Process-scoped admission gate shared by every session */
  ADMISSION_GATE: "admissionGate",

  /** Registry of all search providers, grouped by tier */
  PROVIDER_REGISTRY: "providerRegistry",

  /** Uniform per-tier backend capability */
  BACKEND_ADAPTER: "backendAdapter",

  /** Query complexity classifier */
  SEMANTIC_ROUTER: "semanticRouter",

  /** Hit-set quality scorer */
  CONFIDENCE_CALCULATOR: "confidenceCalculator",

  /** Tier escalation state machine */
  RETRIEVAL_ENGINE: "retrievalEngine",

  /** Post-retrieval dedupe and budget fitting */
  CONTEXT_PRUNER: "contextPruner",

  /** Main search orchestrator */
  ORCHESTRATOR: "orchestrator",
} as const;

/**
 * Type representing any valid service key
 */
export type ServiceKey = (typeof ServiceKeys)[keyof typeof ServiceKeys];
