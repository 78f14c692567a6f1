/**
 * Generated report checks.
 */

export {
  inspectReport,
  summarizeInspection,
  citationPattern,
  extractCitations,
  findCitationMarkers,
  splitParagraphs,
  countWords,
  type CitationMarker,
  type InspectionRule,
  type InspectionIssue,
  type ReportInspection,
} from "./inspect.js";
