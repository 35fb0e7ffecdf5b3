// Public API surface for consumers importing the library.

export { bootstrapContainer } from "../bootstrap/container";
export type { BootstrapOptions } from "../bootstrap/container";
// Config helpers
export {
  createConfig,
  defineConfig,
  defineDuckDuckGo,
  defineExa,
  defineSearxng,
  defineTavily,
} from "../config/defineConfig";
export { getConfigPaths, loadConfig, resolveConfig } from "../config/load";
export type {
  DuckDuckGoConfig,
  EngineConfig,
  ExaConfig,
  SearxngConfig,
  TavilyConfig,
  TieredSearchConfig,
} from "../config/types";
export type { TieredSearchConfigInput } from "../config/validation";
export { AdmissionGate } from "../core/admission";
export type { OrchestratorResult, TieredSearchOptions } from "../core/orchestrator";
export { TieredSearchOrchestrator } from "../core/orchestrator";
export { parseQuery } from "../core/query";
export { ServiceKeys } from "../core/serviceKeys";
export { BackendError, QueryValidationError, RetrievalCancelledError, TIER_ORDER } from "../core/types";
export type {
  BackendErrorKind,
  Complexity,
  RetrievalOutcome,
  RoutingDecision,
  SearchFilters,
  SearchHit,
  SearchQuery,
  Tier,
  TierAttempt,
} from "../core/types";
// Types
export type {
  TieredSearchInput,
  TieredSearchOutput,
  TieredSearchOutputItem,
} from "../tool/interface";
export type { TieredSearchToolOptions } from "../tool/tieredSearchTool";
export { tieredSearch } from "../tool/tieredSearchTool";
