/**
 * Pipeline configuration module.
 *
 * Usage:
 *   import { loadPipelineConfig, DEFAULT_PIPELINE_CONFIG } from "./config/pipeline/index.js";
 *
 *   const config = loadPipelineConfig({
 *     ...DEFAULT_PIPELINE_CONFIG,
 *     retrieval: { ...DEFAULT_PIPELINE_CONFIG.retrieval, topK: 3 },
 *   });
 */

export type {
  PipelineConfig,
  RetrievalSettings,
  ContextSettings,
  GenerationSettings,
  ReportRules,
} from "./schema.js";

export {
  PipelineConfigSchema,
  RetrievalSettingsSchema,
  ContextSettingsSchema,
  GenerationSettingsSchema,
  ReportRulesSchema,
} from "./schema.js";

export {
  loadPipelineConfig,
  validatePipelineConfig,
  PipelineConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_PIPELINE_CONFIG, wikipediaEndpoints } from "./defaults.js";
