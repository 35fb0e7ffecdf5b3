/**
 * Bootstrap the Dependency Injection Container
 *
 * Sets up all services and their dependencies
 */

import { loadConfig, resolveConfig } from "../config/load";
import type { EngineConfig, TieredSearchConfig } from "../config/types";
import type { TieredSearchConfigInput } from "../config/validation";
import { AdmissionGate } from "../core/admission";
import { BackendAdapter } from "../core/backend/BackendAdapter";
import { type Container, container } from "../core/container";
import { createLogger } from "../core/logger";
import { TieredSearchOrchestrator } from "../core/orchestrator";
import type { SearchProvider } from "../core/provider";
import { ProviderRegistry } from "../core/provider";
import { ProviderFactory } from "../core/provider/ProviderFactory";
import { ServiceKeys } from "../core/serviceKeys";
import { ContextPruner } from "../processing/contextPruner";
import { ConfidenceCalculator } from "../routing/confidence";
import { SemanticRouter } from "../routing/semanticRouter";
import { TieredRetrievalEngine } from "../routing/tieredRetrieval";

const log = createLogger("Bootstrap");

let processGate: AdmissionGate | undefined;

/**
 * The process-wide admission gate; replaced only when the configured limit changes
 */
function sharedAdmissionGate(limit: number): AdmissionGate {
  if (!processGate || processGate.snapshot().limit !== limit) {
    processGate = new AdmissionGate(limit);
  }
  return processGate;
}

export interface BootstrapOptions {
  /** Gate to use instead of the process-wide one */
  admissionGate?: AdmissionGate;
  /** Build providers differently (tests use in-process fakes) */
  createProvider?: (config: EngineConfig) => SearchProvider;
}

/**
 * Bootstrap the DI container with all services
 *
 * @param configOrPath - Either a config file path (string) or a config object directly
 * @throws Error when the configuration is invalid or no provider is usable
 */
export async function bootstrapContainer(
  configOrPath?: string | TieredSearchConfigInput,
  options: BootstrapOptions = {},
): Promise<Container> {
  // Clear existing registrations (useful for testing)
  container.reset();

  const config: TieredSearchConfig =
    typeof configOrPath === "object" && configOrPath !== null
      ? resolveConfig(configOrPath)
      : await loadConfig(configOrPath);

  const createProvider = options.createProvider ?? ProviderFactory.createProvider;

  container.singleton(ServiceKeys.CONFIG, () => config);

  container.singleton(
    ServiceKeys.ADMISSION_GATE,
    () => options.admissionGate ?? sharedAdmissionGate(config.retrieval.maxConcurrentRequests),
  );

  container.singleton(ServiceKeys.PROVIDER_REGISTRY, () => {
    const registry = new ProviderRegistry();
    const failedProviders: string[] = [];
    const skippedProviders: string[] = [];

    for (const engineConfig of config.engines) {
      if (!engineConfig.enabled) {
        continue;
      }

      try {
        const provider = createProvider(engineConfig);

        // Skip providers that aren't configured (e.g., missing API key)
        if (!provider.isConfigured()) {
          log.debug(`Skipping provider ${engineConfig.id}: ${provider.getMissingConfigMessage()}`);
          skippedProviders.push(engineConfig.id);
          continue;
        }

        registry.register(provider);
        log.debug(`Registered provider: ${engineConfig.id} (tier ${provider.tier})`);
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        log.warn(`Failed to register provider ${engineConfig.id}: ${errorMsg}`);
        failedProviders.push(engineConfig.id);
      }
    }

    if (registry.list().length === 0) {
      const allSkipped = [...failedProviders, ...skippedProviders];
      const skipDetails = allSkipped.length > 0 ? `Skipped: ${allSkipped.join(", ")}. ` : "";
      throw new Error(
        `No search providers available. ${skipDetails}\n\n` +
          "To fix this, either:\n" +
          "  1. Point SEARXNG_URL at a running SearXNG instance\n" +
          "  2. Set an API key: export EXA_API_KEY=... or TAVILY_API_KEY=...\n" +
          "  3. Create a config file: tiered-search.config.json",
      );
    }

    return registry;
  });

  container.singleton(
    ServiceKeys.BACKEND_ADAPTER,
    (c) =>
      new BackendAdapter(
        c.get<ProviderRegistry>(ServiceKeys.PROVIDER_REGISTRY),
        c.get<AdmissionGate>(ServiceKeys.ADMISSION_GATE),
        { timeoutMs: config.retrieval.timeoutMs },
      ),
  );

  container.singleton(ServiceKeys.SEMANTIC_ROUTER, () => new SemanticRouter(config.router, config.tiers));

  container.singleton(
    ServiceKeys.CONFIDENCE_CALCULATOR,
    () => new ConfidenceCalculator(config.confidence),
  );

  container.singleton(
    ServiceKeys.RETRIEVAL_ENGINE,
    (c) =>
      new TieredRetrievalEngine(
        c.get<BackendAdapter>(ServiceKeys.BACKEND_ADAPTER),
        c.get<ConfidenceCalculator>(ServiceKeys.CONFIDENCE_CALCULATOR),
        {
          tiers: config.tiers,
          defaultLimit: config.retrieval.defaultLimit,
          extractTopK: config.retrieval.extractTopK,
        },
      ),
  );

  container.singleton(ServiceKeys.CONTEXT_PRUNER, () => new ContextPruner());

  container.singleton(
    ServiceKeys.ORCHESTRATOR,
    (c) =>
      new TieredSearchOrchestrator(
        c.get<SemanticRouter>(ServiceKeys.SEMANTIC_ROUTER),
        c.get<TieredRetrievalEngine>(ServiceKeys.RETRIEVAL_ENGINE),
        c.get<ContextPruner>(ServiceKeys.CONTEXT_PRUNER),
        config.retrieval.tokenBudget,
      ),
  );

  // Resolve provider registry to trigger validation (throws if no providers registered)
  container.get<ProviderRegistry>(ServiceKeys.PROVIDER_REGISTRY);

  return container;
}
