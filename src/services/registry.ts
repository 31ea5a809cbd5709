import { BUILTIN_FIXERS, BUILTIN_SCANNERS, type PatchflowConfig } from "../config/schema.js";
import type { PatchflowSecrets } from "../config/loader.js";
import { ConfigurationError } from "../core/errors.js";
import { HttpService } from "../core/http.js";
import { HttpFixClient, type FixClient } from "./fix-client.js";
import { HttpRagClient, type RagClient } from "./rag-client.js";
import { HttpScanClient, type ScanClient } from "./scan-client.js";

/** Identifier → implementation lookup for pluggable scanners and fixers. */
export class ServiceRegistry<T> {
  private readonly entries = new Map<string, T>();

  constructor(private readonly kind: string) {}

  register(id: string, implementation: T): this {
    this.entries.set(id, implementation);
    return this;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  resolve(id: string): T {
    const implementation = this.entries.get(id);
    if (implementation === undefined) {
      const known = this.ids().join(", ") || "none";
      throw new ConfigurationError(`Unknown ${this.kind} "${id}" (registered: ${known})`);
    }
    return implementation;
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }
}

export interface ServiceCatalog {
  scanners: ServiceRegistry<ScanClient>;
  fixers: ServiceRegistry<FixClient>;
  rag: RagClient;
  /** Raw endpoints, for health checks. */
  services: { scan: HttpService; fix: HttpService; rag: HttpService };
}

export function createHttpServices(
  config: PatchflowConfig,
  secrets: PatchflowSecrets = {}
): ServiceCatalog["services"] {
  const { maxRetries } = config.services;
  const make = (name: string, endpoint: PatchflowConfig["services"]["scan"]): HttpService =>
    new HttpService({
      name,
      baseUrl: endpoint.baseUrl,
      timeoutMs: endpoint.timeoutMs,
      maxRetries,
      ...(secrets.apiKey !== undefined && { apiKey: secrets.apiKey }),
    });

  return {
    scan: make("scan", config.services.scan),
    fix: make("fix", config.services.fix),
    rag: make("rag", config.services.rag),
  };
}

/**
 * Default catalog: every built-in scanner goes through the scan service (the
 * scanner id travels as `scanner_type`), every built-in fixer through the fix
 * service.
 */
export function createServiceCatalog(
  config: PatchflowConfig,
  secrets: PatchflowSecrets = {}
): ServiceCatalog {
  const services = createHttpServices(config, secrets);

  const scanClient = new HttpScanClient(services.scan);
  const scanners = new ServiceRegistry<ScanClient>("scanner");
  for (const id of BUILTIN_SCANNERS) scanners.register(id, scanClient);

  const fixClient = new HttpFixClient(services.fix);
  const fixers = new ServiceRegistry<FixClient>("fixer");
  for (const id of BUILTIN_FIXERS) fixers.register(id, fixClient);

  return {
    scanners,
    fixers,
    rag: new HttpRagClient(services.rag, config.rag.collection),
    services,
  };
}
