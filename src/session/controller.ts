/**
 * Step Controller.
 *
 * A three-state machine (Input → Retrieval → Report) invoked once per
 * external event:
 *
 *   submit()   "Generate" pressed: validate the inputs, then rewind the
 *              session to Retrieval with every derived field cleared.
 *   advance()  one re-evaluation cycle: run whichever stage the session is
 *              missing, at most one retrieval call and one generation call,
 *              never recomputing a field that is already populated.
 *
 * Adapters return Outcome values; the controller inspects them before any
 * state transition and turns failures into notices for the user. Nothing is
 * retried within a cycle: after a failure the session stays where it is, and
 * only the next explicit event repeats the missing call.
 */

import type { PipelineConfig } from "../config/index.js";
import type { GenerationError, Generator } from "../generation/index.js";
import type { Logger } from "../logging/index.js";
import { buildSourceContext, type PromptBuilder } from "../prompts/index.js";
import { inspectReport, summarizeInspection, type ReportInspection } from "../report/index.js";
import { isBlankDocument, type RetrievalError, type Retriever } from "../retrieval/index.js";
import { Step, type Document, type Notice, type Session } from "../types/index.js";
import { advanceStep, resetForSubmission, storeDocuments } from "./state.js";

export interface ControllerDependencies {
  retriever: Retriever;
  generator: Generator;
  prompts: Pick<PromptBuilder, "build">;
  config: Readonly<PipelineConfig>;
  logger: Logger;
}

export interface SubmitInput {
  industry: string;
  credential: string;
  /** Defaults to the configured default model */
  model?: string;
}

export interface SubmitResult {
  accepted: boolean;
  notices: Notice[];
}

export interface CycleInput {
  credential: string;
  model?: string;
}

export interface CycleResult {
  step: Step;
  notices: Notice[];
  /** Which external services this cycle called */
  calls: { retrieval: boolean; generation: boolean };
  /** Present on the cycle that generated the report */
  inspection?: ReportInspection;
}

export class StepController {
  private readonly deps: ControllerDependencies;

  constructor(deps: ControllerDependencies) {
    this.deps = deps;
  }

  /**
   * Handle a "Generate" request. Invalid input leaves the session untouched.
   */
  submit(session: Session, input: SubmitInput): SubmitResult {
    const { logger, config } = this.deps;
    const model = input.model ?? config.generation.defaultModel;

    if (input.credential.trim() === "") {
      return rejected("error", "MISSING_CREDENTIAL", "Please enter your API key first.");
    }

    if (input.industry.trim() === "") {
      return rejected("warning", "MISSING_INDUSTRY", "Please enter an industry name.");
    }

    const unknown = this.checkModel(model);
    if (unknown !== null) {
      return { accepted: false, notices: [unknown] };
    }

    resetForSubmission(session, input.industry);
    logger.info("Industry submitted", { industry: input.industry, model });
    return { accepted: true, notices: [] };
  }

  /**
   * Run one re-evaluation cycle against the stored session state.
   */
  async advance(session: Session, input: CycleInput): Promise<CycleResult> {
    const { config } = this.deps;
    const notices: Notice[] = [];
    const calls = { retrieval: false, generation: false };
    const finish = (inspection?: ReportInspection): CycleResult => ({
      step: session.step,
      notices,
      calls,
      ...(inspection ? { inspection } : {}),
    });

    if (session.step < Step.Retrieval) {
      return finish();
    }

    const unknown = this.checkModel(input.model ?? config.generation.defaultModel);
    if (unknown !== null) {
      notices.push(unknown);
      return finish();
    }

    if (session.documents === null) {
      calls.retrieval = true;
      const retrieved = await this.retrieve(session.industry, notices);
      if (retrieved === null) {
        return finish();
      }
      storeDocuments(session, retrieved);
    }

    const documents = session.documents ?? [];
    this.describeSources(documents, notices);
    session.context = buildSourceContext(documents, config.context.maxCharsPerDocument);
    advanceStep(session, Step.Report);

    if (session.report !== null && session.report !== "") {
      return finish();
    }

    calls.generation = true;
    const report = await this.runGeneration(session, documents, input, notices);
    if (report === null) {
      return finish();
    }

    session.report = report;
    return finish(this.inspect(report, documents, notices));
  }

  /**
   * submit() followed, when accepted, by one advance() cycle.
   */
  async generate(session: Session, input: SubmitInput): Promise<CycleResult> {
    const submitted = this.submit(session, input);
    if (!submitted.accepted) {
      return {
        step: session.step,
        notices: submitted.notices,
        calls: { retrieval: false, generation: false },
      };
    }
    return this.advance(session, input);
  }

  private checkModel(model: string): Notice | null {
    const { models } = this.deps.config.generation;
    if (models.includes(model)) {
      return null;
    }
    return {
      severity: "error",
      code: "UNKNOWN_MODEL",
      message: `Unknown model "${model}". Choose one of: ${models.join(", ")}.`,
    };
  }

  // -------------------------------------------------------------------------
  // Stages
  // -------------------------------------------------------------------------

  private async retrieve(industry: string, notices: Notice[]): Promise<Document[] | null> {
    const { retriever, config, logger } = this.deps;
    const { topK } = config.retrieval;

    logger.info("Searching Wikipedia", { industry, topK });
    const outcome = await retriever.retrieve(industry, topK);

    if (!outcome.success) {
      logRetrievalFailure(logger, industry, outcome.error);
      notices.push({
        severity: "error",
        code: "RETRIEVAL_FAILED",
        message: `Error retrieving data: ${outcome.error.message}`,
      });
      return null;
    }

    const documents = outcome.value.slice(0, topK);

    if (documents.length === 0) {
      logger.warn("No Wikipedia pages found", { industry });
      notices.push({
        severity: "error",
        code: "NO_RESULTS",
        message: "No relevant Wikipedia pages found. Please try a different industry.",
      });
      return null;
    }

    if (documents.every(isBlankDocument)) {
      logger.warn("All retrieved pages are blank", { industry, pages: documents.length });
      notices.push({
        severity: "error",
        code: "BLANK_CONTENT",
        message: "The Wikipedia pages found contain no text. Please try a different industry.",
      });
      return null;
    }

    logger.info("Retrieval complete", { industry, pages: documents.length });
    return documents;
  }

  private describeSources(documents: readonly Document[], notices: Notice[]): void {
    const { topK } = this.deps.config.retrieval;
    const count = documents.length;

    if (count < topK) {
      notices.push({
        severity: "warning",
        code: "PARTIAL_RESULTS",
        message:
          `Only ${count} relevant Wikipedia pages were found. ` +
          "The report will be generated based on the available pages.",
      });
    } else {
      notices.push({
        severity: "success",
        code: "RETRIEVAL_COMPLETE",
        message: `Found ${count} relevant Wikipedia pages.`,
      });
    }

    const blank = documents.filter(isBlankDocument);
    if (blank.length > 0) {
      notices.push({
        severity: "warning",
        code: "BLANK_CONTENT",
        message: `These pages have no text content and will not be cited: ${blank.map((doc) => doc.title).join(", ")}.`,
      });
    }
  }

  private async runGeneration(
    session: Session,
    documents: readonly Document[],
    input: CycleInput,
    notices: Notice[]
  ): Promise<string | null> {
    const { generator, prompts, config, logger } = this.deps;
    const model = input.model ?? config.generation.defaultModel;
    const prompt = prompts.build(session.industry, documents);

    logger.info("Generating report", {
      industry: session.industry,
      model,
      promptCharacters: prompt.system.length + prompt.user.length,
    });

    const outcome = await generator.generate({
      system: prompt.system,
      user: prompt.user,
      credential: input.credential,
      model,
      temperature: config.generation.temperature,
      maxOutputTokens: config.generation.maxOutputTokens,
    });

    if (!outcome.success) {
      logGenerationFailure(logger, session.industry, outcome.error);
      notices.push({
        severity: "error",
        code: "GENERATION_FAILED",
        message: `Error generating report: ${outcome.error.message}`,
      });
      return null;
    }

    return outcome.value;
  }

  private inspect(
    report: string,
    documents: readonly Document[],
    notices: Notice[]
  ): ReportInspection {
    const { config, logger } = this.deps;
    const inspection = inspectReport(report, config.report, documents);

    logger.info("Report generated", {
      words: inspection.wordCount,
      paragraphs: inspection.paragraphCount,
      cited: inspection.citedTitles.length,
    });

    if (!inspection.isCompliant) {
      logger.warn("Report deviates from formatting rules", {
        issues: inspection.issues.map((issue) => issue.message),
      });
      notices.push({
        severity: "warning",
        code: "REPORT_OFF_SPEC",
        message: summarizeInspection(inspection),
      });
    }

    notices.push({ severity: "success", code: "REPORT_READY", message: "Report generated." });
    return inspection;
  }
}

function rejected(
  severity: Notice["severity"],
  code: Notice["code"],
  message: string
): SubmitResult {
  return { accepted: false, notices: [{ severity, code, message }] };
}

function logRetrievalFailure(logger: Logger, industry: string, error: RetrievalError): void {
  logger.error("Retrieval failed", { industry, error: error.message });
}

function logGenerationFailure(logger: Logger, industry: string, error: GenerationError): void {
  logger.error("Generation failed", { industry, error: error.message });
}
