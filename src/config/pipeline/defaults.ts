/**
 * Default pipeline configuration.
 */

import type { PipelineConfig } from "./schema.js";

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  retrieval: {
    topK: 5,
    language: "en",
    apiUrl: "https://en.wikipedia.org/w/api.php",
    baseArticleUrl: "https://en.wikipedia.org/wiki/",
    userAgent: "industry-snapshot/0.1.0 (Node.js)",
  },

  // Bounds prompt size; a plain prefix cut per document
  context: {
    maxCharsPerDocument: 6000,
  },

  generation: {
    models: ["gpt-5"],
    defaultModel: "gpt-5",
    temperature: 0.2,
    fixedTemperatureModels: ["gpt-5"],
    maxOutputTokens: 800,
  },

  report: {
    wordCountMin: 420,
    wordCountMax: 450,
    paragraphCount: 4,
    synthesisFromParagraph: 2,
    minSourcesPerSynthesisParagraph: 2,
    outlookShareMinPercent: 25,
    geographyParagraphs: [3, 4],
    citationFormat: "[Source: {title}]",
  },
};

/**
 * Wikipedia endpoints for a language edition.
 */
export function wikipediaEndpoints(language: string): {
  apiUrl: string;
  baseArticleUrl: string;
} {
  return {
    apiUrl: `https://${language}.wikipedia.org/w/api.php`,
    baseArticleUrl: `https://${language}.wikipedia.org/wiki/`,
  };
}
