import { z } from "zod";

import type { HttpService } from "../core/http.js";
import { RagDocumentSchema, type RagDocument, type RagPreparation, type RuleQuery } from "../core/types/index.js";

export interface RagClient {
  search(query: RuleQuery, signal?: AbortSignal): Promise<RagDocument[]>;
  /** Opaque warm-up run alongside the scan. */
  prepare(projectPath: string, signal?: AbortSignal): Promise<RagPreparation>;
}

const SearchResponseSchema = z.looseObject({
  sources: z.array(RagDocumentSchema).default([]),
});

const HealthResponseSchema = z.looseObject({
  status: z.string().optional(),
});

export class HttpRagClient implements RagClient {
  constructor(
    private readonly http: HttpService,
    private readonly collection: string
  ) {}

  async search(query: RuleQuery, signal?: AbortSignal): Promise<RagDocument[]> {
    const response = await this.http.postJson(
      "/api/v1/rag/search",
      {
        query: [...query.query],
        limit: query.limit,
        combine_mode: query.combineMode,
        collection_name: this.collection,
        filters: {},
      },
      SearchResponseSchema,
      signal
    );
    return response.sources;
  }

  async prepare(_projectPath: string, signal?: AbortSignal): Promise<RagPreparation> {
    const health = await this.http.getJson("/health", HealthResponseSchema, signal);
    const ready = health.status === undefined || health.status === "healthy" || health.status === "ok";
    if (!ready) {
      throw new Error(`knowledge service reported status "${health.status ?? ""}"`);
    }
    return { ready, collection: this.collection };
  }
}
