import { z } from "zod";

import type { HttpService } from "../core/http.js";
import { FindingSchema, type ScanResult } from "../core/types/index.js";

export interface ScanClient {
  scan(projectPath: string, scannerType: string, signal?: AbortSignal): Promise<ScanResult>;
}

// Older scan services answer with `vulnerabilities` instead of `findings`.
const ScanResponseSchema = z.looseObject({
  status: z.string().default("success"),
  message: z.string().optional(),
  findings: z.array(FindingSchema).optional(),
  vulnerabilities: z.array(FindingSchema).optional(),
});

export class HttpScanClient implements ScanClient {
  constructor(private readonly http: HttpService) {}

  async scan(projectPath: string, scannerType: string, signal?: AbortSignal): Promise<ScanResult> {
    const response = await this.http.postJson(
      "/api/v1/scan/single",
      { project_path: projectPath, scanner_type: scannerType },
      ScanResponseSchema,
      signal
    );
    return {
      status: response.status,
      findings: response.findings ?? response.vulnerabilities ?? [],
      ...(response.message !== undefined && { message: response.message }),
    };
  }
}
