/**
 * Container wiring with in-process providers
 */

import { describe, expect, test, vi } from "vitest";
import { bootstrapContainer } from "../../src/bootstrap/container";
import type { EngineConfig } from "../../src/config/types";
import type { TieredSearchConfigInput } from "../../src/config/validation";
import { AdmissionGate } from "../../src/core/admission";
import type { ProviderRegistry } from "../../src/core/provider";
import { ServiceKeys } from "../../src/core/serviceKeys";
import { ExaProvider } from "../../src/providers/exa";
import { FakeSearchProvider } from "../__helpers__";

const config: TieredSearchConfigInput = {
  engines: [
    { id: "duckduckgo", type: "duckduckgo", displayName: "DuckDuckGo" },
    { id: "exa", type: "exa", displayName: "Exa" },
  ],
};

const fake = (engine: EngineConfig) => new FakeSearchProvider(engine.id, { tier: engine.tier });

describe("bootstrapContainer", () => {
  test("registers every service", async () => {
    const container = await bootstrapContainer(config, { createProvider: fake });
    for (const key of Object.values(ServiceKeys)) {
      expect(container.has(key)).toBe(true);
    }
    const registry = container.get<ProviderRegistry>(ServiceKeys.PROVIDER_REGISTRY);
    expect(registry.list().map((provider) => provider.id)).toEqual(["duckduckgo", "exa"]);
  });

  test("resolves singletons once", async () => {
    const container = await bootstrapContainer(config, { createProvider: fake });
    expect(container.get(ServiceKeys.ORCHESTRATOR)).toBe(container.get(ServiceKeys.ORCHESTRATOR));
  });

  test("skips disabled and unconfigured providers", async () => {
    const container = await bootstrapContainer(
      {
        engines: [
          { id: "duckduckgo", type: "duckduckgo", displayName: "DuckDuckGo" },
          { id: "exa", type: "exa", displayName: "Exa" },
          { id: "tavily", type: "tavily", displayName: "Tavily", enabled: false },
        ],
      },
      {
        createProvider: (engine) =>
          new FakeSearchProvider(engine.id, { tier: engine.tier, configured: engine.id !== "exa" }),
      },
    );
    const registry = container.get<ProviderRegistry>(ServiceKeys.PROVIDER_REGISTRY);
    expect(registry.tiers()).toEqual(["free"]);
  });

  test("real keyed providers are skipped without their key", async () => {
    await expect(
      bootstrapContainer({ engines: [{ id: "exa", type: "exa", displayName: "Exa" }] }),
    ).rejects.toThrow("No search providers available. Skipped: exa.");
  });

  test("registers a real keyed provider when its key is set", async () => {
    vi.stubEnv("EXA_API_KEY", "test-secret");
    const container = await bootstrapContainer({
      engines: [{ id: "exa", type: "exa", displayName: "Exa" }],
    });
    const registry = container.get<ProviderRegistry>(ServiceKeys.PROVIDER_REGISTRY);
    expect(registry.get("exa")).toBeInstanceOf(ExaProvider);
  });

  test("reports providers that fail to build", async () => {
    await expect(
      bootstrapContainer(config, {
        createProvider: () => {
          throw new Error("bad engine");
        },
      }),
    ).rejects.toThrow("No search providers available. Skipped: duckduckgo, exa.");
  });

  test("rejects an invalid configuration", async () => {
    await expect(bootstrapContainer({ engines: [] })).rejects.toThrow(
      "Invalid configuration in provided configuration:",
    );
  });

  test("shares one admission gate per process until the limit changes", async () => {
    const first = await bootstrapContainer(config, { createProvider: fake });
    const gateA = first.get<AdmissionGate>(ServiceKeys.ADMISSION_GATE);

    const second = await bootstrapContainer(config, { createProvider: fake });
    expect(second.get<AdmissionGate>(ServiceKeys.ADMISSION_GATE)).toBe(gateA);

    const third = await bootstrapContainer(
      { ...config, retrieval: { maxConcurrentRequests: 3 } },
      { createProvider: fake },
    );
    const gateB = third.get<AdmissionGate>(ServiceKeys.ADMISSION_GATE);
    expect(gateB).not.toBe(gateA);
    expect(gateB.snapshot().limit).toBe(3);
  });

  test("uses an injected admission gate", async () => {
    const gate = new AdmissionGate(2);
    const container = await bootstrapContainer(config, { createProvider: fake, admissionGate: gate });
    expect(container.get(ServiceKeys.ADMISSION_GATE)).toBe(gate);
  });
});
