/**
 * Retrieved encyclopedia articles.
 */

export interface Document {
  readonly title: string;
  readonly sourceUrl: string;
  readonly content: string;
}
