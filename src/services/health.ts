import type { HttpService } from "../core/http.js";

export interface ServiceHealth {
  name: string;
  url: string;
  healthy: boolean;
  latencyMs: number;
}

export async function checkServices(services: readonly HttpService[]): Promise<ServiceHealth[]> {
  return Promise.all(
    services.map(async (service) => {
      const startedAt = Date.now();
      const healthy = await service.ping();
      return {
        name: service.name,
        url: service.url,
        healthy,
        latencyMs: Date.now() - startedAt,
      };
    })
  );
}
