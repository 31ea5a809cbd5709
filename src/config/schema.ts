import { z } from "zod";

export const ExecutionModeSchema = z.enum(["local", "api"]);
export const CombineModeSchema = z.enum(["OR", "AND"]);
export const TemplateTypeSchema = z.enum(["fix", "fix_with_serena"]);

export type ExecutionMode = z.infer<typeof ExecutionModeSchema>;
export type CombineMode = z.infer<typeof CombineModeSchema>;
export type TemplateType = z.infer<typeof TemplateTypeSchema>;

// Identifiers the default service catalog registers. The registries accept more.
export const BUILTIN_SCANNERS = ["bearer", "sonar"] as const;
export const BUILTIN_FIXERS = ["llm"] as const;

export const DEFAULT_PARALLEL_TIMEOUT_SECONDS = 600;
export const DEFAULT_RAG_LIMIT = 5;

const BaseUrlSchema = z
  .url()
  .refine(
    (val) => {
      try {
        const url = new URL(val);
        if (url.protocol !== "http:" && url.protocol !== "https:") return false;
        if (url.username || url.password) return false;
        return url.hostname !== "169.254.169.254";
      } catch {
        return false;
      }
    },
    { message: "Invalid baseUrl. Must be http/https, without credentials or a metadata IP" }
  )
  .transform((val) => (val.endsWith("/") ? val.slice(0, -1) : val));

const SCAN_ENDPOINT = { baseUrl: "http://localhost:8001", timeoutMs: 300_000 };
const FIX_ENDPOINT = { baseUrl: "http://localhost:8002", timeoutMs: 300_000 };
const RAG_ENDPOINT = { baseUrl: "http://localhost:8003", timeoutMs: 30_000 };

function endpointSchema(defaults: { baseUrl: string; timeoutMs: number }) {
  return z
    .object({
      baseUrl: BaseUrlSchema.default(defaults.baseUrl),
      timeoutMs: z.number().int().positive().default(defaults.timeoutMs),
    })
    .default(defaults);
}

export const ServicesConfigSchema = z.object({
  scan: endpointSchema(SCAN_ENDPOINT),
  fix: endpointSchema(FIX_ENDPOINT),
  rag: endpointSchema(RAG_ENDPOINT),
  maxRetries: z.number().int().min(0).max(10).default(2),
});

export const RagConfigSchema = z.object({
  enabled: z.boolean().default(false),
  limit: z.number().int().min(1).max(20).default(DEFAULT_RAG_LIMIT),
  combineMode: CombineModeSchema.default("OR"),
  collection: z.string().min(1).default("fixer_rag_collection"),
});

export const FixConfigSchema = z.object({
  templateType: TemplateTypeSchema.default("fix"),
  concurrency: z.number().int().min(1).max(16).default(2),
});

export const OutputConfigSchema = z.object({
  resultsDir: z.string().default(".patchflow/results"),
  keepReports: z.number().int().min(1).default(10),
  save: z.boolean().default(true),
});

export const PatchflowConfigSchema = z
  .object({
    projectPath: z.string().min(1).default("."),
    scanner: z.string().min(1).default("bearer"),
    fixer: z.string().min(1).default("llm"),
    mode: ExecutionModeSchema.default("local"),
    parallel: z.boolean().default(false),
    // Upper bound keeps the deadline inside setTimeout's 32-bit range.
    parallelTimeoutSeconds: z
      .number()
      .positive()
      .max(86_400)
      .default(DEFAULT_PARALLEL_TIMEOUT_SECONDS),
    // One verification scan after fixes were applied.
    rescan: z.boolean().default(false),
    rag: RagConfigSchema.default({
      enabled: false,
      limit: DEFAULT_RAG_LIMIT,
      combineMode: "OR",
      collection: "fixer_rag_collection",
    }),
    fix: FixConfigSchema.default({ templateType: "fix", concurrency: 2 }),
    services: ServicesConfigSchema.default({
      scan: SCAN_ENDPOINT,
      fix: FIX_ENDPOINT,
      rag: RAG_ENDPOINT,
      maxRetries: 2,
    }),
    output: OutputConfigSchema.default({
      resultsDir: ".patchflow/results",
      keepReports: 10,
      save: true,
    }),
  })
  .strict();

export type PatchflowConfig = z.infer<typeof PatchflowConfigSchema>;
export type ServiceEndpoint = ServicesConfig["scan"];
export type ServicesConfig = z.infer<typeof ServicesConfigSchema>;
export type RagConfig = z.infer<typeof RagConfigSchema>;
export type FixConfig = z.infer<typeof FixConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
