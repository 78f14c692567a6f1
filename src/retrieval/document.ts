/**
 * Conversion from raw search hits to session documents.
 */

import type { Document } from "../types/index.js";

/**
 * A hit as returned by the encyclopedia service. The URL may be absent.
 */
export interface RetrievedArticle {
  title: string;
  sourceUrl?: string | undefined;
  content?: string | null | undefined;
}

/**
 * Canonical article URL for a title: spaces become underscores, prefixed
 * with the encyclopedia's article path.
 *
 * @example canonicalArticleUrl("Electric vehicle", "https://en.wikipedia.org/wiki/")
 *   // "https://en.wikipedia.org/wiki/Electric_vehicle"
 */
export function canonicalArticleUrl(title: string, baseArticleUrl: string): string {
  return `${baseArticleUrl}${title.replace(/ /g, "_")}`;
}

export function toDocument(article: RetrievedArticle, baseArticleUrl: string): Document {
  const title = article.title.trim() === "" ? "No Title" : article.title;
  const sourceUrl =
    article.sourceUrl && article.sourceUrl.trim() !== ""
      ? article.sourceUrl
      : canonicalArticleUrl(title, baseArticleUrl);

  return Object.freeze({
    title,
    sourceUrl,
    content: article.content ?? "",
  });
}

/**
 * Whether a document carries no usable text (stub or empty extract).
 */
export function isBlankDocument(document: Document): boolean {
  return document.content.trim() === "";
}
