/**
 * User-facing messages produced by a pipeline cycle.
 */

export type NoticeSeverity = "error" | "warning" | "success" | "info";

export type NoticeCode =
  | "MISSING_CREDENTIAL"
  | "MISSING_INDUSTRY"
  | "UNKNOWN_MODEL"
  | "RETRIEVAL_FAILED"
  | "NO_RESULTS"
  | "PARTIAL_RESULTS"
  | "BLANK_CONTENT"
  | "RETRIEVAL_COMPLETE"
  | "GENERATION_FAILED"
  | "REPORT_READY"
  | "REPORT_OFF_SPEC";

export interface Notice {
  readonly severity: NoticeSeverity;
  readonly code: NoticeCode;
  readonly message: string;
}
