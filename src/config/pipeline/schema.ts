/**
 * Pipeline configuration schema.
 *
 * The pipeline configuration is validated once at startup, frozen, and then
 * shared by the retrieval, prompt and generation stages of every cycle in a
 * session. A session never observes a configuration change: starting over
 * with different values means starting a new process.
 */

import { z } from "zod";

/** Characters a Wikipedia language code may contain (e.g. "en", "zh-yue"). */
const LANGUAGE_CODE = /^[a-z]{2,3}(-[a-z0-9]+)*$/;

/**
 * Encyclopedia search settings.
 */
export const RetrievalSettingsSchema = z
  .object({
    /** Number of articles requested from the search service */
    topK: z
      .number()
      .int()
      .min(1)
      .max(20)
      .describe("Number of top-ranked articles to retrieve per query"),

    /** Wikipedia language edition */
    language: z
      .string()
      .regex(LANGUAGE_CODE)
      .describe("Wikipedia language edition, e.g. 'en'"),

    /** MediaWiki Action API endpoint */
    apiUrl: z.string().url().describe("MediaWiki Action API endpoint"),

    /** Prefix used to synthesize article URLs from titles */
    baseArticleUrl: z
      .string()
      .url()
      .refine((url) => url.endsWith("/"), "must end with '/'")
      .describe("Article path prefix used when a result carries no URL"),

    /** User-Agent sent to the search service */
    userAgent: z.string().min(1).describe("User-Agent header for API requests"),
  })
  .strict();

export type RetrievalSettings = z.infer<typeof RetrievalSettingsSchema>;

/**
 * How retrieved documents are folded into the prompt context.
 */
export const ContextSettingsSchema = z
  .object({
    /** Prefix length kept from each document's content */
    maxCharsPerDocument: z
      .number()
      .int()
      .min(1)
      .describe("Maximum characters of each document fed to the prompt"),
  })
  .strict();

export type ContextSettings = z.infer<typeof ContextSettingsSchema>;

/**
 * Text generation settings.
 */
export const GenerationSettingsSchema = z
  .object({
    /** Models offered to the user */
    models: z
      .array(z.string().min(1))
      .min(1)
      .describe("Model identifiers the user may select"),

    /** Model selected when the user makes no choice */
    defaultModel: z.string().min(1).describe("Preselected model identifier"),

    temperature: z.number().min(0).max(2).describe("Sampling temperature"),

    /** Models that only accept the service's default temperature */
    fixedTemperatureModels: z
      .array(z.string().min(1))
      .describe("Models sent without a temperature"),

    maxOutputTokens: z
      .number()
      .int()
      .min(1)
      .describe("Upper bound on generated tokens"),
  })
  .strict()
  .refine((settings) => settings.models.includes(settings.defaultModel), {
    message: "defaultModel must be one of models",
    path: ["defaultModel"],
  });

export type GenerationSettings = z.infer<typeof GenerationSettingsSchema>;

/**
 * Formatting rules the generated report must follow.
 */
export const ReportRulesSchema = z
  .object({
    wordCountMin: z.number().int().min(1),

    /** Exclusive upper bound: the report must stay strictly below it */
    wordCountMax: z.number().int().min(1),

    paragraphCount: z.number().int().min(1),

    /** First paragraph (1-based) that must blend several sources */
    synthesisFromParagraph: z.number().int().min(1),

    minSourcesPerSynthesisParagraph: z.number().int().min(1),

    /** Share of the final paragraph the forward-looking statement must exceed */
    outlookShareMinPercent: z.number().int().min(1).max(99),

    /** Paragraphs (1-based) where geography may appear as supporting clauses */
    geographyParagraphs: z.array(z.number().int().min(1)),

    /** Citation marker; `{title}` is replaced by the source title */
    citationFormat: z
      .string()
      .refine((format) => format.includes("{title}"), "must contain {title}"),
  })
  .strict()
  .refine((rules) => rules.wordCountMin < rules.wordCountMax, {
    message: "wordCountMin must be below wordCountMax",
    path: ["wordCountMin"],
  })
  .refine((rules) => rules.synthesisFromParagraph <= rules.paragraphCount, {
    message: "synthesisFromParagraph must not exceed paragraphCount",
    path: ["synthesisFromParagraph"],
  })
  .refine(
    (rules) => rules.geographyParagraphs.every((p) => p <= rules.paragraphCount),
    {
      message: "geographyParagraphs must reference existing paragraphs",
      path: ["geographyParagraphs"],
    }
  );

export type ReportRules = z.infer<typeof ReportRulesSchema>;

/**
 * Complete pipeline configuration.
 */
export const PipelineConfigSchema = z
  .object({
    retrieval: RetrievalSettingsSchema,
    context: ContextSettingsSchema,
    generation: GenerationSettingsSchema,
    report: ReportRulesSchema,
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
