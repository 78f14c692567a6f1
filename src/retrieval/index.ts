/**
 * Encyclopedia retrieval.
 */

export { RetrievalError, type Retriever } from "./retriever.js";
export {
  WikipediaRetriever,
  type WikipediaRetrieverOptions,
} from "./wikipedia.js";
export {
  canonicalArticleUrl,
  toDocument,
  isBlankDocument,
  type RetrievedArticle,
} from "./document.js";
