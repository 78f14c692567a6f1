/**
 * Report constraint generation and injection.
 *
 * The report's formatting rules (length band, paragraph structure, citation
 * marker, multi-source synthesis, forward-looking close, geography placement,
 * no meta-commentary) are derived in code from the frozen ReportRules and
 * appended to the rendered user prompt by the renderer. Template files carry
 * the persona and the paragraph plan; they cannot omit, weaken or reorder
 * these rules.
 *
 * Same rules + same document set → identical constraint text.
 */

import type { ReportRules } from "../config/index.js";
import { isBlankDocument } from "../retrieval/document.js";
import type { Document } from "../types/index.js";
import { formatCitation } from "./context.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConstraintRule {
  category:
    | "length"
    | "structure"
    | "evidence"
    | "citation"
    | "synthesis"
    | "outlook"
    | "geography"
    | "style";
  /** The constraint text, written as a directive. */
  text: string;
}

/**
 * Constraints for a single render.
 *
 *   - `universal`: follow from the report rules alone
 *   - `sourceSpecific`: depend on the retrieved document set
 */
export interface PromptConstraints {
  universal: readonly ConstraintRule[];
  sourceSpecific: readonly ConstraintRule[];
}

export interface ConstraintInput {
  rules: Readonly<ReportRules>;
  documents: readonly Document[];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * "Paragraph 2", "Paragraphs 3 and 4", "Paragraphs 2, 3 and 4".
 */
export function describeParagraphs(paragraphs: readonly number[]): string {
  const sorted = [...paragraphs].sort((a, b) => a - b);
  if (sorted.length === 1) {
    return `Paragraph ${sorted[0]}`;
  }
  const head = sorted.slice(0, -1).join(", ");
  return `Paragraphs ${head} and ${sorted[sorted.length - 1]}`;
}

function range(from: number, to: number): number[] {
  const result: number[] = [];
  for (let p = from; p <= to; p++) {
    result.push(p);
  }
  return result;
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export function buildPromptConstraints(input: ConstraintInput): PromptConstraints {
  const { rules, documents } = input;
  const universal: ConstraintRule[] = [];
  const sourceSpecific: ConstraintRule[] = [];
  const last = rules.paragraphCount;
  const citation = formatCitation(rules.citationFormat, "Page Title");

  // ── Universal ────────────────────────────────────────────────────────
  universal.push({
    category: "length",
    text: `Length: ${rules.wordCountMin}–${rules.wordCountMax} words (MUST be < ${rules.wordCountMax}).`,
  });

  universal.push({
    category: "structure",
    text: `Structure: EXACTLY ${rules.paragraphCount} long, analytical paragraphs. No headings. No bullet points.`,
  });

  universal.push({
    category: "evidence",
    text: "Use ONLY the extracts below. If a claim is not explicitly supported, omit it.",
  });

  universal.push({
    category: "citation",
    text: `Use ${citation} for key claims. Each paragraph MUST include at least one citation.`,
  });

  universal.push({
    category: "citation",
    text: "Do not invent page titles; cite only the source titles listed above.",
  });

  universal.push({
    category: "outlook",
    text:
      `${describeParagraphs([last])} MUST culminate in a sharp, forward-looking analytical implication ` +
      `that accounts for more than ${rules.outlookShareMinPercent}% of the paragraph's length.`,
  });

  universal.push({
    category: "geography",
    text:
      rules.geographyParagraphs.length > 0
        ? `Geography (e.g., specific countries or markets) may only appear as short supporting clauses ` +
          `within ${describeParagraphs(rules.geographyParagraphs)}, never as the primary subject.`
        : "Do not make any country or regional market the subject of the analysis.",
  });

  universal.push({
    category: "style",
    text: "No meta-language: do not mention the extracts, the task, or limitations (avoid phrases like “the extracts provided”).",
  });

  universal.push({
    category: "style",
    text: "No generic conclusion (avoid “In conclusion” or “Overall”).",
  });

  // ── Source-specific ──────────────────────────────────────────────────
  const synthesisParagraphs = range(rules.synthesisFromParagraph, last);
  const required = rules.minSourcesPerSynthesisParagraph;
  const blank = documents.filter(isBlankDocument);
  const usable = documents.length - blank.length;

  if (usable >= required) {
    sourceSpecific.push({
      category: "synthesis",
      text: `${describeParagraphs(synthesisParagraphs)} MUST each blend evidence from ${required}+ different source pages.`,
    });
  } else if (usable <= 1) {
    sourceSpecific.push({
      category: "synthesis",
      text: "Only one source page is available; ground every paragraph in it and cite it each time.",
    });
  } else {
    sourceSpecific.push({
      category: "synthesis",
      text: `${describeParagraphs(synthesisParagraphs)} MUST each blend evidence from all ${usable} available source pages.`,
    });
  }

  if (blank.length > 0 && usable > 0) {
    sourceSpecific.push({
      category: "evidence",
      text: `These pages have no usable text and must not be cited: ${blank.map((doc) => doc.title).join(", ")}.`,
    });
  }

  return Object.freeze({
    universal: Object.freeze(universal),
    sourceSpecific: Object.freeze(sourceSpecific),
  });
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

const CONSTRAINTS_HEADING = "## Constraints (zero tolerance for deviation)";

/**
 * Format PromptConstraints as a markdown block for prompt injection.
 * This is the only code path that produces constraint text.
 */
export function formatConstraints(constraints: PromptConstraints): string {
  const lines: string[] = [CONSTRAINTS_HEADING, ""];

  for (const rule of [...constraints.universal, ...constraints.sourceSpecific]) {
    lines.push(`- [${rule.category}] ${rule.text}`);
  }
  lines.push("");

  return lines.join("\n");
}

export function countConstraints(constraints: PromptConstraints): number {
  return constraints.universal.length + constraints.sourceSpecific.length;
}
