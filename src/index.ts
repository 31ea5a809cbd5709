// Config
export * from "./config/schema.js";
export {
  loadConfig,
  deepMerge,
  type ConfigLoaderOptions,
  type DeepPartial,
  type LoadedConfig,
  type PatchflowSecrets,
} from "./config/loader.js";

// Core
export * from "./core/types/index.js";
export * from "./core/errors.js";
export { HttpService, ServiceHttpError, type HttpServiceOptions } from "./core/http.js";
export { extractRuleQuery, selectFixableFindings, countFindingTypes } from "./core/rules/rule-extractor.js";
export {
  JobSupervisor,
  type Work,
  type WorkHandle,
  type WorkOutcome,
  type WorkState,
} from "./core/supervisor/job-supervisor.js";

// Services
export type { ScanClient } from "./services/scan-client.js";
export type { RagClient } from "./services/rag-client.js";
export type { FixClient } from "./services/fix-client.js";
export { HttpScanClient } from "./services/scan-client.js";
export { HttpRagClient } from "./services/rag-client.js";
export { HttpFixClient } from "./services/fix-client.js";
export {
  ServiceRegistry,
  createServiceCatalog,
  createHttpServices,
  type ServiceCatalog,
} from "./services/registry.js";
export { checkServices, type ServiceHealth } from "./services/health.js";

// Workflow
export * from "./workflow/strategies/index.js";
export { WorkflowOrchestrator, type WorkflowOrchestratorOptions } from "./workflow/orchestrator.js";
export { runFixStage, groupFixTargets, type FixStageResult, type FixTargetResult } from "./workflow/fix-stage.js";
export { buildReport, buildFailedReport, type WorkflowReport, type PerformanceMetrics } from "./workflow/report.js";
export { saveReport, pruneReports } from "./workflow/report-writer.js";

// Utils
export { logger } from "./utils/logger.js";
