/**
 * Terminal rendering of a session and the notices of one cycle.
 */

import { Step, type Document, type Notice, type Session } from "../types/index.js";

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export interface ViewOptions {
  /** ANSI colors; off unless requested */
  color?: boolean;
}

function paint(options: ViewOptions, color: keyof typeof COLORS, text: string): string {
  return options.color ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

const NOTICE_STYLE = {
  error: { label: "Error", color: "red" },
  warning: { label: "Warning", color: "yellow" },
  success: { label: "OK", color: "green" },
  info: { label: "Info", color: "cyan" },
} as const;

export function formatNotice(notice: Notice, options: ViewOptions = {}): string {
  const style = NOTICE_STYLE[notice.severity];
  return `${paint(options, style.color, `${style.label}:`)} ${notice.message}`;
}

/**
 * Numbered source list, one `n. Title <url>` line per document.
 */
export function formatSources(documents: readonly Document[]): string {
  return documents
    .map((doc, index) => `${index + 1}. ${doc.title} <${doc.sourceUrl}>`)
    .join("\n");
}

/**
 * The view for the session's current step, followed by the cycle's notices.
 */
export function renderSession(
  session: Session,
  notices: readonly Notice[],
  options: ViewOptions = {}
): string {
  const lines: string[] = [];

  if (session.step === Step.Input) {
    lines.push(paint(options, "dim", "Enter an industry name to generate a report."));
  } else {
    lines.push(paint(options, "bold", `Industry: ${session.industry}`));

    if (session.documents !== null) {
      lines.push("");
      lines.push(paint(options, "bold", "Sources"));
      lines.push(formatSources(session.documents));
    }

    if (session.step === Step.Report && session.report !== null) {
      lines.push("");
      lines.push(paint(options, "bold", "Industry Report"));
      lines.push(session.report);
    }
  }

  if (notices.length > 0) {
    lines.push("");
    for (const notice of notices) {
      lines.push(formatNotice(notice, options));
    }
  }

  return lines.join("\n");
}
