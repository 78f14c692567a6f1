/**
 * Prompt template parsing and variable extraction.
 *
 * A prompt template is a plain-text string (loaded from a .md or .txt file)
 * containing `{{variable.path}}` placeholders. This module extracts them and
 * validates them against the typed PromptContextMap so that invalid
 * references are caught when the template is loaded, before any service call.
 *
 * Rules:
 *   - Placeholders use double-brace syntax: {{ and }}
 *   - Variable names are dotted alphanumeric paths
 *   - Whitespace inside braces is trimmed: {{ industry.name }} is valid
 *   - Unrecognized variable names are rejected at parse time
 *   - Duplicate placeholders are fine (same value rendered)
 */

import type { PromptVariable } from "./context.js";

/**
 * Matches `{{variable.name}}` with optional inner whitespace.
 * Captures the trimmed variable name in group 1.
 */
export const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

/**
 * A parsed and validated prompt template.
 */
export interface ParsedTemplate {
  /** The raw template source string (with placeholders intact). */
  source: string;
  /** Unique variable names found in {{…}} placeholders, sorted. */
  variables: PromptVariable[];
  /** Optional name/id for error messages. */
  name?: string;
}

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" references unknown variable(s): ${invalidVariables.join(", ")}`
    );
    this.name = "TemplateParseError";
  }
}

/**
 * Complete set of legal variable names.
 * Must stay in sync with PromptContextMap in context.ts.
 */
const VALID_VARIABLES: ReadonlySet<string> = new Set<PromptVariable>([
  "industry.name",
  "source.name",
  "sources.count",
  "sources.titles",
  "sources.context",
  "report.wordCountMin",
  "report.wordCountMax",
  "report.paragraphCount",
  "citation.example",
]);

export function isValidVariable(name: string): name is PromptVariable {
  return VALID_VARIABLES.has(name);
}

/**
 * Return all valid variable names (sorted).
 */
export function getValidVariables(): PromptVariable[] {
  return [...VALID_VARIABLES].filter(isValidVariable).sort();
}

/**
 * Extract all `{{…}}` placeholder names from a template string.
 * Returns deduplicated, sorted variable names.
 */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_RE)) {
    const name = match[1];
    if (name !== undefined) {
      found.add(name);
    }
  }
  return [...found].sort();
}

/**
 * Parse a template string, extracting and validating all variables.
 *
 * @throws TemplateParseError if any {{variable}} name is invalid
 */
export function parseTemplate(source: string, name?: string): ParsedTemplate {
  const rawVariables = extractVariables(source);
  const invalid = rawVariables.filter((v) => !isValidVariable(v));

  if (invalid.length > 0) {
    throw new TemplateParseError(name ?? "(anonymous)", invalid);
  }

  return {
    source,
    variables: rawVariables.filter(isValidVariable),
    name,
  };
}
