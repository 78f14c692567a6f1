/**
 * Wikipedia retrieval through the MediaWiki Action API.
 *
 * One `list=search` request ranks candidate titles, then each title is
 * fetched as a plain-text extract. Search order is preserved; the service's
 * ranking is not second-guessed.
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";

import type { RetrievalSettings } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import { fail, succeed, type Document, type Outcome } from "../types/index.js";
import { toDocument } from "./document.js";
import { RetrievalError, type Retriever } from "./retriever.js";

// ---------------------------------------------------------------------------
// Response schemas (formatversion=2)
// ---------------------------------------------------------------------------

const ApiErrorSchema = z.object({
  error: z.object({ code: z.string(), info: z.string() }),
});

const SearchResponseSchema = z.object({
  query: z.object({
    search: z.array(z.object({ title: z.string() })),
  }),
});

const PageResponseSchema = z.object({
  query: z.object({
    pages: z.array(
      z.object({
        title: z.string(),
        missing: z.boolean().optional(),
        extract: z.string().optional(),
        fullurl: z.string().optional(),
      })
    ),
  }),
});

// ---------------------------------------------------------------------------
// Retriever
// ---------------------------------------------------------------------------

export interface WikipediaRetrieverOptions {
  settings: Readonly<RetrievalSettings>;
  /** HTTP client; a default instance is created from the settings */
  http?: AxiosInstance;
  logger?: Logger;
}

export class WikipediaRetriever implements Retriever {
  private readonly settings: Readonly<RetrievalSettings>;
  private readonly http: AxiosInstance;
  private readonly logger: Logger | undefined;

  constructor(options: WikipediaRetrieverOptions) {
    this.settings = options.settings;
    this.logger = options.logger;
    this.http =
      options.http ??
      axios.create({
        headers: { "User-Agent": options.settings.userAgent },
      });
  }

  async retrieve(
    query: string,
    topK: number
  ): Promise<Outcome<Document[], RetrievalError>> {
    try {
      const titles = await this.search(query, topK);
      this.logger?.debug("Wikipedia search complete", { query, hits: titles.length });

      const documents: Document[] = [];
      for (const title of titles.slice(0, topK)) {
        const document = await this.fetchPage(title);
        if (document) {
          documents.push(document);
        }
      }
      return succeed(documents);
    } catch (err) {
      return fail(toRetrievalError(err));
    }
  }

  private async search(query: string, topK: number): Promise<string[]> {
    const data = await this.get({
      action: "query",
      list: "search",
      srsearch: query,
      srlimit: topK,
      srprop: "",
    });
    const parsed = SearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new RetrievalError("Unexpected search response from Wikipedia");
    }
    return parsed.data.query.search.map((hit) => hit.title);
  }

  private async fetchPage(title: string): Promise<Document | null> {
    const data = await this.get({
      action: "query",
      prop: "extracts|info",
      inprop: "url",
      explaintext: 1,
      redirects: 1,
      titles: title,
    });
    const parsed = PageResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new RetrievalError(`Unexpected page response from Wikipedia for "${title}"`);
    }

    const page = parsed.data.query.pages[0];
    if (!page || page.missing) {
      this.logger?.warn("Wikipedia page missing, skipped", { title });
      return null;
    }

    return toDocument(
      { title: page.title, sourceUrl: page.fullurl, content: page.extract },
      this.settings.baseArticleUrl
    );
  }

  private async get(params: Record<string, string | number>): Promise<unknown> {
    const response = await this.http.get<unknown>(this.settings.apiUrl, {
      params: { ...params, format: "json", formatversion: 2 },
    });
    const apiError = ApiErrorSchema.safeParse(response.data);
    if (apiError.success) {
      throw new RetrievalError(
        `Wikipedia API error (${apiError.data.error.code}): ${apiError.data.error.info}`
      );
    }
    return response.data;
  }
}

function toRetrievalError(err: unknown): RetrievalError {
  if (err instanceof RetrievalError) {
    return err;
  }
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const detail = status !== undefined ? `HTTP ${status}` : err.message;
    return new RetrievalError(`Wikipedia request failed: ${detail}`, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new RetrievalError(message, { cause: err });
}
