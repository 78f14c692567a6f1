/**
 * Session State Store.
 *
 * A session is created on first interaction and mutated in place by the
 * step controller only. Nothing is persisted.
 */

import { Step, type Document, type Session } from "../types/index.js";

export function createSession(): Session {
  return {
    step: Step.Input,
    industry: "",
    documents: null,
    context: "",
    report: null,
  };
}

/**
 * Start a fresh run for `industry`: step back to Retrieval and drop every
 * derived field.
 */
export function resetForSubmission(session: Session, industry: string): void {
  session.industry = industry;
  session.step = Step.Retrieval;
  session.documents = null;
  session.context = "";
  session.report = null;
}

/**
 * Store retrieved documents, frozen along with the sequence holding them.
 */
export function storeDocuments(session: Session, documents: readonly Document[]): void {
  session.documents = Object.freeze(documents.map((doc) => Object.freeze({ ...doc })));
}

/**
 * Advance to `next` if it is later than the current step. Steps never move
 * backwards here; only resetForSubmission() rewinds.
 */
export function advanceStep(session: Session, next: Step): void {
  if (next > session.step) {
    session.step = next;
  }
}
