/**
 * Session state for one user's interaction sequence.
 */

import type { Document } from "./document.js";

/**
 * Pipeline steps, ordered. Numeric values allow `step >= Step.Retrieval`.
 */
export enum Step {
  Input = 1,
  Retrieval = 2,
  Report = 3,
}

export interface Session {
  step: Step;
  industry: string;
  /** null until retrieval has succeeded for the current industry */
  documents: readonly Document[] | null;
  /** Always rebuilt from documents */
  context: string;
  /** null until generation has succeeded */
  report: string | null;
}
