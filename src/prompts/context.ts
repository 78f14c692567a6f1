/**
 * Typed prompt context.
 *
 * Every valid `{{path.to.value}}` placeholder in a prompt template maps to a
 * key of PromptContextMap. The context is a flat namespace of dotted paths
 * built from the industry, the retrieved documents and the report rules;
 * template authors only reach for these curated values.
 *
 *   industry.name         → the industry exactly as the user typed it
 *   sources.context       → buildSourceContext(documents, maxCharsPerDocument)
 *   report.paragraphCount → config.report.paragraphCount
 *
 * Adding a new variable requires exactly three changes:
 *   1. Add the key to PromptContextMap
 *   2. Add it to VALID_VARIABLES in template.ts
 *   3. Populate it in buildPromptContext()
 */

import type { PipelineConfig } from "../config/index.js";
import type { Document } from "../types/index.js";

// ---------------------------------------------------------------------------
// Context map
// ---------------------------------------------------------------------------

export interface PromptContextMap {
  // ── Request ────────────────────────────────────────────────
  "industry.name": string;

  // ── Sources ────────────────────────────────────────────────
  "source.name": string;
  "sources.count": string;
  "sources.titles": string;
  "sources.context": string;

  // ── Report rules ───────────────────────────────────────────
  "report.wordCountMin": string;
  "report.wordCountMax": string;
  "report.paragraphCount": string;
  "citation.example": string;
}

/** A legal prompt variable name. */
export type PromptVariable = keyof PromptContextMap;

/** The concrete context object passed to the renderer. */
export type PromptContext = Readonly<PromptContextMap>;

export interface PromptContextInput {
  industry: string;
  /** Omitted when rendering prompts that do not embed sources */
  documents?: readonly Document[];
  config: Readonly<Pick<PipelineConfig, "context" | "report">>;
}

/** Human name of the encyclopedia, used in prompt wording. */
export const SOURCE_NAME = "Wikipedia";

/** Sentinel for variables whose source was not provided. */
const UNSET = "__UNSET__";

// ---------------------------------------------------------------------------
// Source context
// ---------------------------------------------------------------------------

/**
 * Prefix of at most `maxChars` UTF-16 units, never ending on half of a
 * surrogate pair.
 */
export function truncateContent(content: string, maxChars: number): string {
  if (content.length <= maxChars) {
    return content;
  }
  const cut = content.slice(0, maxChars);
  const last = cut.charCodeAt(cut.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut;
}

/**
 * Concatenate each document's source URL and truncated content, in order.
 */
export function buildSourceContext(
  documents: readonly Document[],
  maxCharsPerDocument: number
): string {
  return documents
    .map(
      (doc) =>
        `Source: ${doc.sourceUrl}\nContent: ${truncateContent(doc.content, maxCharsPerDocument)}\n\n`
    )
    .join("");
}

/**
 * Render a citation marker for a title using the configured format.
 */
export function formatCitation(citationFormat: string, title: string): string {
  return citationFormat.replace("{title}", () => title);
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Build a fully-populated prompt context.
 *
 * When `documents` is omitted the `sources.*` variables receive the UNSET
 * sentinel, so a template that needs them fails at render time instead of
 * producing a prompt with no evidence.
 */
export function buildPromptContext(input: PromptContextInput): PromptContext {
  const { industry, documents, config } = input;

  const ctx: PromptContextMap = {
    "industry.name": industry,

    "source.name": SOURCE_NAME,
    "sources.count": documents ? String(documents.length) : UNSET,
    "sources.titles": documents
      ? documents.map((doc) => `- ${doc.title}`).join("\n")
      : UNSET,
    "sources.context": documents
      ? buildSourceContext(documents, config.context.maxCharsPerDocument)
      : UNSET,

    "report.wordCountMin": String(config.report.wordCountMin),
    "report.wordCountMax": String(config.report.wordCountMax),
    "report.paragraphCount": String(config.report.paragraphCount),
    "citation.example": formatCitation(config.report.citationFormat, "Page Title"),
  };

  return Object.freeze(ctx);
}

/**
 * Check whether a context value is the UNSET sentinel.
 */
export function isUnset(value: string): boolean {
  return value === UNSET;
}
