/**
 * Assembles the system and user instructions for one report request.
 */

import type { PipelineConfig } from "../config/index.js";
import type { Document } from "../types/index.js";
import { buildPromptConstraints } from "./constraints.js";
import { buildPromptContext } from "./context.js";
import { PromptTemplateLoader } from "./loader.js";
import { renderPrompt } from "./renderer.js";

export const SYSTEM_TEMPLATE = "system.md";
export const REPORT_TEMPLATE = "industry-report.md";

export interface ReportPrompt {
  system: string;
  user: string;
}

export class PromptBuilder {
  private readonly config: Readonly<Pick<PipelineConfig, "context" | "report">>;
  private readonly loader: PromptTemplateLoader;

  constructor(
    config: Readonly<Pick<PipelineConfig, "context" | "report">>,
    loader: PromptTemplateLoader = new PromptTemplateLoader()
  ) {
    this.config = config;
    this.loader = loader;

    // Parse both templates up front so a broken template fails at startup
    this.loader.load(SYSTEM_TEMPLATE);
    this.loader.load(REPORT_TEMPLATE);
  }

  build(industry: string, documents: readonly Document[]): ReportPrompt {
    const context = buildPromptContext({ industry, documents, config: this.config });

    const system = renderPrompt(this.loader.load(SYSTEM_TEMPLATE), context, {
      strict: false,
    }).trim();

    const user = renderPrompt(this.loader.load(REPORT_TEMPLATE), context, {
      constraints: buildPromptConstraints({ rules: this.config.report, documents }),
    }).trim();

    return { system, user };
  }
}
