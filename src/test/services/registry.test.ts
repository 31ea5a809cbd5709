import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { ConfigurationError } from "../../core/errors.js";
import { checkServices } from "../../services/health.js";
import { createHttpServices, createServiceCatalog, ServiceRegistry } from "../../services/registry.js";
import type { ScanClient } from "../../services/scan-client.js";
import { logger } from "../../utils/logger.js";
import { makeConfig } from "../fixtures.js";

describe("ServiceRegistry", () => {
  const scanner: ScanClient = { scan: () => Promise.resolve({ status: "success", findings: [] }) };

  it("resolves registered identifiers", () => {
    const registry = new ServiceRegistry<ScanClient>("scanner").register("bearer", scanner);

    expect(registry.has("bearer")).toBe(true);
    expect(registry.resolve("bearer")).toBe(scanner);
    expect(registry.ids()).toEqual(["bearer"]);
  });

  it("throws a ConfigurationError naming the known identifiers", () => {
    const registry = new ServiceRegistry<ScanClient>("scanner")
      .register("bearer", scanner)
      .register("sonar", scanner);

    expect(() => registry.resolve("semgrep")).toThrow(ConfigurationError);
    expect(() => registry.resolve("semgrep")).toThrow(
      'Unknown scanner "semgrep" (registered: bearer, sonar)'
    );
  });

  it("reports an empty registry", () => {
    expect(() => new ServiceRegistry<ScanClient>("fixer").resolve("llm")).toThrow(
      'Unknown fixer "llm" (registered: none)'
    );
  });
});

describe("createServiceCatalog", () => {
  it("registers the built-in scanners and fixers", () => {
    const catalog = createServiceCatalog(makeConfig());

    expect(catalog.scanners.ids()).toEqual(["bearer", "sonar"]);
    expect(catalog.fixers.ids()).toEqual(["llm"]);
  });

  it("points each service at its configured URL", () => {
    const services = createHttpServices(
      makeConfig({ services: { scan: { baseUrl: "http://scan.internal:9001" } } })
    );

    expect(services.scan.url).toBe("http://scan.internal:9001");
    expect(services.fix.url).toBe("http://localhost:8002");
    expect(services.rag.url).toBe("http://localhost:8003");
  });
});

describe("checkServices", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(logger, "debug").mockImplementation(vi.fn());
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("reports each service as up or down", async () => {
    fetchMock.mockImplementation((input) =>
      String(input).includes("8002")
        ? Promise.reject(new TypeError("fetch failed"))
        : Promise.resolve(new Response("{}", { status: 200 }))
    );
    const services = createHttpServices(makeConfig());

    const results = await checkServices([services.scan, services.fix, services.rag]);

    expect(results.map((r) => [r.name, r.url, r.healthy])).toEqual([
      ["scan", "http://localhost:8001", true],
      ["fix", "http://localhost:8002", false],
      ["rag", "http://localhost:8003", true],
    ]);
  });
});
