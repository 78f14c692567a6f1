/**
 * Prompt template system.
 *
 * Templates in prompts/ use `{{variable}}` placeholders validated against a
 * typed context; report constraints are derived in code and appended to the
 * user prompt.
 *
 * ```typescript
 * const builder = new PromptBuilder(pipelineConfig);
 * const { system, user } = builder.build("Electric Vehicles", documents);
 * ```
 */

export {
  PromptBuilder,
  SYSTEM_TEMPLATE,
  REPORT_TEMPLATE,
  type ReportPrompt,
} from "./builder.js";

export {
  buildPromptContext,
  buildSourceContext,
  truncateContent,
  formatCitation,
  isUnset,
  SOURCE_NAME,
  type PromptContext,
  type PromptContextMap,
  type PromptContextInput,
  type PromptVariable,
} from "./context.js";

export {
  parseTemplate,
  extractVariables,
  isValidVariable,
  getValidVariables,
  TemplateParseError,
  type ParsedTemplate,
} from "./template.js";

export {
  renderPrompt,
  PromptRenderError,
  UnusedVariableError,
  type RenderOptions,
} from "./renderer.js";

export {
  PromptTemplateLoader,
  TemplateLoadError,
  DEFAULT_PROMPTS_DIR,
} from "./loader.js";

export {
  buildPromptConstraints,
  formatConstraints,
  countConstraints,
  describeParagraphs,
  type ConstraintRule,
  type PromptConstraints,
  type ConstraintInput,
} from "./constraints.js";
