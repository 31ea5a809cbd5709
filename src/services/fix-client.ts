import { z } from "zod";

import type { TemplateType } from "../config/schema.js";
import type { HttpService } from "../core/http.js";
import type { FixOutcome, FixTarget, RagDocument } from "../core/types/index.js";

export interface FixClient {
  fix(
    target: FixTarget,
    templateType: TemplateType,
    ragContext?: readonly RagDocument[],
    signal?: AbortSignal
  ): Promise<FixOutcome>;
}

const FixResponseSchema = z.looseObject({
  success: z.boolean().optional(),
  fixed: z.boolean().optional(),
  fixed_count: z.number().int().optional(),
});

export class HttpFixClient implements FixClient {
  constructor(private readonly http: HttpService) {}

  async fix(
    target: FixTarget,
    templateType: TemplateType,
    ragContext?: readonly RagDocument[],
    signal?: AbortSignal
  ): Promise<FixOutcome> {
    const response = await this.http.postJson(
      "/fix",
      {
        target: target.file,
        project_path: target.projectPath,
        bugs: target.findings,
        template_type: templateType,
        use_rag: ragContext !== undefined,
        rag_context: ragContext ?? null,
        mode: target.mode,
      },
      FixResponseSchema,
      signal
    );
    const fixed = response.fixed ?? response.success ?? (response.fixed_count ?? 0) > 0;
    return { fixed, details: response };
  }
}
