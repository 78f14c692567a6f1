/**
 * Report inspection.
 *
 * Checks a generated report against the measurable report rules: word band,
 * paragraph count, no headings or bullets, a citation in every paragraph,
 * citations that name retrieved sources, and multi-source synthesis.
 *
 * Inspection never rejects a report. Issues are returned so the controller
 * can log them and tell the user the report is off-spec.
 */

import type { ReportRules } from "../config/index.js";
import { isBlankDocument } from "../retrieval/document.js";
import type { Document } from "../types/index.js";

export type InspectionRule =
  | "WORD_COUNT"
  | "PARAGRAPH_COUNT"
  | "HEADING"
  | "BULLET"
  | "MISSING_CITATION"
  | "UNKNOWN_SOURCE"
  | "SYNTHESIS";

export interface InspectionIssue {
  rule: InspectionRule;
  message: string;
  suggestion: string;
  /** 1-based paragraph the issue was found in, when it is local to one */
  paragraph?: number;
}

export interface ReportInspection {
  wordCount: number;
  paragraphCount: number;
  /** Distinct cited titles, in order of first appearance */
  citedTitles: string[];
  issues: InspectionIssue[];
  isCompliant: boolean;
}

const HEADING_RE = /^\s{0,3}#{1,6}\s/m;
const BULLET_RE = /^\s*(?:[-*•]|\d+[.)])\s+/m;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Regex matching citation markers in the configured format; group 1 holds
 * the cited title(s).
 */
export function citationPattern(citationFormat: string): RegExp {
  const [prefix = "", suffix = ""] = citationFormat.split("{title}");
  const body = suffix === "" ? "([^\\n]+)" : "([^\\n]+?)";
  return new RegExp(`${escapeRegExp(prefix)}${body}${escapeRegExp(suffix)}`, "g");
}

export interface CitationMarker {
  /** Offset of the marker's opening delimiter */
  start: number;
  /** Offset just past the closing delimiter */
  end: number;
  titles: string[];
}

function skipSpaces(text: string, position: number): number {
  let index = position;
  while (text[index] === " " || text[index] === "\t") {
    index++;
  }
  return index;
}

/** First offset of any of `needles` in `text` at or after `from`, or -1. */
function firstOf(text: string, needles: readonly string[], from: number): number {
  let first = -1;
  for (const needle of needles) {
    const index = text.indexOf(needle, from);
    if (index !== -1 && (first === -1 || index < first)) {
      first = index;
    }
  }
  return first;
}

/**
 * Read one marker body starting after its opening delimiter. Known titles
 * are tried longest first, so a title containing the separator or the
 * closing delimiter is read whole. Returns null when the marker is not
 * closed on its line.
 */
function readMarker(
  text: string,
  start: number,
  suffix: string,
  candidates: readonly string[]
): { titles: string[]; end: number } | null {
  const titles: string[] = [];
  const closesAt = (offset: number): boolean => {
    const next = skipSpaces(text, offset);
    return text.startsWith(";", next) || text.startsWith(suffix, next);
  };
  let position = start;

  for (;;) {
    position = skipSpaces(text, position);
    const lower = text.slice(position).toLowerCase();

    const known = candidates.find(
      (title) => lower.startsWith(title.toLowerCase()) && closesAt(position + title.length)
    );

    let after: number;
    if (known !== undefined) {
      titles.push(text.slice(position, position + known.length));
      after = position + known.length;
    } else {
      const stop = firstOf(text, [";", suffix, "\n"], position);
      if (stop === -1 || text[stop] === "\n") {
        return null;
      }
      const title = text.slice(position, stop).trim();
      if (title !== "") {
        titles.push(title);
      }
      after = stop;
    }

    after = skipSpaces(text, after);
    if (text.startsWith(";", after)) {
      position = after + 1;
    } else if (text.startsWith(suffix, after)) {
      return { titles, end: after + suffix.length };
    } else {
      return null;
    }
  }
}

/**
 * Citation markers in a span of text. A marker may name several titles
 * separated by semicolons. Without known titles, or for a format with an
 * empty delimiter, titles are split on the separator as written.
 */
export function findCitationMarkers(
  text: string,
  citationFormat: string,
  knownTitles: readonly string[] = []
): CitationMarker[] {
  const [prefix = "", suffix = ""] = citationFormat.split("{title}");
  const markers: CitationMarker[] = [];

  if (prefix === "" || suffix === "" || knownTitles.length === 0) {
    for (const match of text.matchAll(citationPattern(citationFormat))) {
      const titles = (match[1] ?? "")
        .split(";")
        .map((title) => title.trim())
        .filter((title) => title !== "");
      const start = match.index ?? 0;
      markers.push({ start, end: start + match[0].length, titles });
    }
    return markers;
  }

  const candidates = knownTitles
    .filter((title) => title.trim() !== "")
    .sort((a, b) => b.length - a.length);
  let start = text.indexOf(prefix);
  while (start !== -1) {
    const marker = readMarker(text, start + prefix.length, suffix, candidates);
    if (marker === null) {
      start = text.indexOf(prefix, start + prefix.length);
      continue;
    }
    markers.push({ start, end: marker.end, titles: marker.titles });
    start = text.indexOf(prefix, marker.end);
  }
  return markers;
}

/**
 * Titles cited in a span of text, in order.
 */
export function extractCitations(
  text: string,
  citationFormat: string,
  knownTitles: readonly string[] = []
): string[] {
  return findCitationMarkers(text, citationFormat, knownTitles).flatMap((marker) => marker.titles);
}

export function splitParagraphs(report: string): string[] {
  return report
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph !== "");
}

/**
 * Words in the prose, citation markers excluded.
 */
export function countWords(
  report: string,
  citationFormat: string,
  knownTitles: readonly string[] = []
): number {
  let prose = "";
  let cursor = 0;
  for (const marker of findCitationMarkers(report, citationFormat, knownTitles)) {
    prose += `${report.slice(cursor, marker.start)} `;
    cursor = marker.end;
  }
  prose += report.slice(cursor);
  return prose.split(/\s+/).filter((word) => /[\p{L}\p{N}]/u.test(word)).length;
}

export function inspectReport(
  report: string,
  rules: Readonly<ReportRules>,
  documents: readonly Document[]
): ReportInspection {
  const issues: InspectionIssue[] = [];
  const titles = documents.map((doc) => doc.title);
  const paragraphs = splitParagraphs(report);
  const wordCount = countWords(report, rules.citationFormat, titles);
  const known = new Map(documents.map((doc) => [doc.title.toLowerCase(), doc.title]));

  if (wordCount < rules.wordCountMin || wordCount >= rules.wordCountMax) {
    issues.push({
      rule: "WORD_COUNT",
      message: `Report has ${wordCount} words; expected ${rules.wordCountMin}–${rules.wordCountMax - 1}.`,
      suggestion: "Regenerate the report.",
    });
  }

  if (paragraphs.length !== rules.paragraphCount) {
    issues.push({
      rule: "PARAGRAPH_COUNT",
      message: `Report has ${paragraphs.length} paragraph(s); expected ${rules.paragraphCount}.`,
      suggestion: "Regenerate the report.",
    });
  }

  if (HEADING_RE.test(report)) {
    issues.push({
      rule: "HEADING",
      message: "Report contains a heading.",
      suggestion: "Headings are not allowed; regenerate the report.",
    });
  }

  if (BULLET_RE.test(report)) {
    issues.push({
      rule: "BULLET",
      message: "Report contains a bulleted or numbered list.",
      suggestion: "Lists are not allowed; regenerate the report.",
    });
  }

  const citedTitles: string[] = [];
  const usable = documents.filter((doc) => !isBlankDocument(doc)).length;
  const requiredSources = Math.min(rules.minSourcesPerSynthesisParagraph, usable);

  paragraphs.forEach((paragraph, index) => {
    const number = index + 1;
    const cited = extractCitations(paragraph, rules.citationFormat, titles);

    if (cited.length === 0) {
      issues.push({
        rule: "MISSING_CITATION",
        message: `Paragraph ${number} has no citation.`,
        suggestion: "Every paragraph must cite at least one source.",
        paragraph: number,
      });
    }

    const distinct = new Set<string>();
    for (const title of cited) {
      const canonical = known.get(title.toLowerCase());
      if (canonical === undefined) {
        issues.push({
          rule: "UNKNOWN_SOURCE",
          message: `Paragraph ${number} cites "${title}", which is not a retrieved source.`,
          suggestion: "Only cite the retrieved page titles.",
          paragraph: number,
        });
        continue;
      }
      distinct.add(canonical);
      if (!citedTitles.includes(canonical)) {
        citedTitles.push(canonical);
      }
    }

    if (number >= rules.synthesisFromParagraph && distinct.size < requiredSources) {
      issues.push({
        rule: "SYNTHESIS",
        message: `Paragraph ${number} draws on ${distinct.size} source(s); expected at least ${requiredSources}.`,
        suggestion: "Blend evidence from several source pages.",
        paragraph: number,
      });
    }
  });

  return {
    wordCount,
    paragraphCount: paragraphs.length,
    citedTitles,
    issues,
    isCompliant: issues.length === 0,
  };
}

/**
 * One-line summary of inspection issues for user display.
 */
export function summarizeInspection(inspection: ReportInspection): string {
  const rules = [...new Set(inspection.issues.map((issue) => issue.rule))];
  return (
    `The report does not fully follow the formatting rules ` +
    `(${inspection.wordCount} words, ${inspection.paragraphCount} paragraphs; ` +
    `issues: ${rules.join(", ")}).`
  );
}
