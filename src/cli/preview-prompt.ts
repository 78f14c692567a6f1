#!/usr/bin/env node
/**
 * CLI tool to preview the prompts sent for a report.
 *
 * Renders the system and user instructions for an industry from a local
 * JSON file of documents, without calling Wikipedia or the model. Useful for
 * checking a template or rule change before spending API credits.
 *
 * Usage:
 *   npm run preview-prompt -- --industry "Electric Vehicles" --documents docs.json
 *
 * The documents file holds an array of { title, sourceUrl?, content? }.
 *
 * Options:
 *   --industry <name>       Industry name (required)
 *   --documents <path>      JSON file of documents (required)
 *   --prompts <dir>         Prompts directory (default: bundled prompts/)
 *   --no-color              Disable ANSI colors
 *   --json                  Output as JSON (includes metadata)
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (missing arguments, unreadable documents, broken template)
 */

import { existsSync, readFileSync, realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { z } from "zod";

import {
  DEFAULT_PIPELINE_CONFIG,
  loadPipelineConfigFromEnv,
  type PipelineConfig,
} from "../config/index.js";
import {
  PromptBuilder,
  PromptTemplateLoader,
  buildPromptConstraints,
  countConstraints,
  type ReportPrompt,
} from "../prompts/index.js";
import { toDocument } from "../retrieval/index.js";
import type { Document } from "../types/index.js";

// ============================================================
// Types
// ============================================================

export interface PreviewResult {
  industry: string;
  prompt: ReportPrompt;
  metadata: {
    documentCount: number;
    constraintCount: number;
    systemChars: number;
    userChars: number;
  };
}

const DocumentsFileSchema = z.array(
  z.object({
    title: z.string(),
    sourceUrl: z.string().optional(),
    content: z.string().optional(),
  })
);

// ============================================================
// Documents
// ============================================================

/**
 * Read and validate a documents file.
 *
 * @throws Error if the file is missing, not JSON, or not an array of documents
 */
export function loadDocumentsFile(filePath: string, baseArticleUrl: string): Document[] {
  const fullPath = resolve(filePath);
  if (!existsSync(fullPath)) {
    throw new Error(`Documents file not found: ${fullPath}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    throw new Error(`Documents file is not valid JSON: ${fullPath}`, { cause: err });
  }

  const parsed = DocumentsFileSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid documents file ${fullPath}:\n${details}`);
  }

  return parsed.data.map((article) => toDocument(article, baseArticleUrl));
}

// ============================================================
// Preview
// ============================================================

export function renderPreview(options: {
  industry: string;
  documents: readonly Document[];
  config?: Readonly<PipelineConfig>;
  promptsDir?: string;
}): PreviewResult {
  const config = options.config ?? DEFAULT_PIPELINE_CONFIG;
  const loader = options.promptsDir
    ? new PromptTemplateLoader(resolve(options.promptsDir))
    : new PromptTemplateLoader();
  const prompt = new PromptBuilder(config, loader).build(options.industry, options.documents);
  const constraints = buildPromptConstraints({
    rules: config.report,
    documents: options.documents,
  });

  return {
    industry: options.industry,
    prompt,
    metadata: {
      documentCount: options.documents.length,
      constraintCount: countConstraints(constraints),
      systemChars: prompt.system.length,
      userChars: prompt.user.length,
    },
  };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

function terminalColors(): boolean {
  return process.stdout.isTTY === true && !process.env.NO_COLOR;
}

export function formatPreview(result: PreviewResult, useColors: boolean = false): string {
  const c = (color: keyof typeof COLORS, text: string): string =>
    useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
  const rule = "─".repeat(60);

  return [
    "",
    c("bold", "═".repeat(60)),
    c("bold", " Prompt Preview"),
    c("bold", "═".repeat(60)),
    "",
    `  ${c("cyan", "Industry:")}    ${result.industry}`,
    `  ${c("cyan", "Documents:")}   ${result.metadata.documentCount}`,
    `  ${c("cyan", "Constraints:")} ${result.metadata.constraintCount}`,
    `  ${c("cyan", "Characters:")}  ${result.metadata.systemChars} system, ${result.metadata.userChars} user`,
    "",
    rule,
    c("bold", "System"),
    rule,
    result.prompt.system,
    "",
    rule,
    c("bold", "User"),
    rule,
    result.prompt.user,
  ].join("\n");
}

function formatError(message: string): string {
  return terminalColors() ? `${COLORS.red}${message}${COLORS.reset}` : message;
}

// ============================================================
// Main
// ============================================================

const USAGE = `
Usage: npm run preview-prompt -- --industry <name> --documents <file.json>

Options:
  --industry <name>       Industry name (required)
  --documents <path>      JSON file of documents (required)
  --prompts <dir>         Prompts directory (default: bundled prompts/)
  --no-color              Disable ANSI colors
  --json                  Output as JSON (includes metadata)
  -h, --help              Show this help message
`;

function main(): number {
  const { values: args } = parseArgs({
    options: {
      industry: { type: "string" },
      documents: { type: "string" },
      prompts: { type: "string" },
      "no-color": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  if (!args.industry || !args.documents) {
    console.error(formatError("Error: --industry and --documents are required"));
    console.error(USAGE);
    return 1;
  }

  const config = loadPipelineConfigFromEnv();
  const documents = loadDocumentsFile(args.documents, config.retrieval.baseArticleUrl);
  const preview = renderPreview({
    industry: args.industry,
    documents,
    config,
    promptsDir: args.prompts,
  });

  console.log(
    args.json
      ? JSON.stringify(preview, null, 2)
      : formatPreview(preview, !args["no-color"] && terminalColors())
  );
  return 0;
}

// Only run when executed directly (not imported by tests)
const entry = process.argv[1];
const isDirectExecution =
  entry !== undefined && realpathSync(entry) === fileURLToPath(import.meta.url);

if (isDirectExecution) {
  try {
    process.exitCode = main();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(formatError(`Error: ${message}`));
    process.exitCode = 1;
  }
}
