/**
 * Provider Factory
 *
 * Maps an engine config to its provider implementation.
 */

import type { EngineConfig } from "../../config/types";
import { DuckDuckGoProvider } from "../../providers/duckduckgo";
import { ExaProvider } from "../../providers/exa";
import { SearxngProvider } from "../../providers/searxng";
import { TavilyProvider } from "../../providers/tavily";
import type { SearchProvider } from "./index";

export const ProviderFactory = {
  createProvider(config: EngineConfig): SearchProvider {
    switch (config.type) {
      case "searxng":
        return new SearxngProvider(config);
      case "duckduckgo":
        return new DuckDuckGoProvider(config);
      case "exa":
        return new ExaProvider(config);
      case "tavily":
        return new TavilyProvider(config);
    }
  },
};
