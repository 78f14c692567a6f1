/**
 * Prompt template loader.
 *
 * Loads prompt templates from disk (.md or .txt files), parses and validates
 * them once, and caches the result for the lifetime of the loader.
 *
 *   const loader = new PromptTemplateLoader();          // bundled prompts/
 *   const tmpl = loader.load("industry-report.md");
 */

import { existsSync, readFileSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { parseTemplate, type ParsedTemplate } from "./template.js";

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
    this.name = "TemplateLoadError";
  }
}

/** File extensions recognized as prompt templates. */
const TEMPLATE_EXTENSIONS = new Set([".md", ".txt"]);

/** The repository's prompts/ directory (two levels above this module). */
export const DEFAULT_PROMPTS_DIR = fileURLToPath(new URL("../../prompts/", import.meta.url));

export class PromptTemplateLoader {
  readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  constructor(baseDir: string = DEFAULT_PROMPTS_DIR) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(
        this.baseDir,
        `Template directory does not exist: ${this.baseDir}`
      );
    }
  }

  /**
   * Load and parse a single template file.
   *
   * @throws TemplateLoadError   if the file is missing or has the wrong extension
   * @throws TemplateParseError  if the template references unknown variables
   */
  load(filename: string): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);
    const ext = extname(filename).toLowerCase();

    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    if (!existsSync(filePath)) {
      throw new TemplateLoadError(filePath, `Template file not found: ${filePath}`);
    }

    const parsed = parseTemplate(readFileSync(filePath, "utf-8"), basename(filename, ext));
    this.cache.set(filename, parsed);
    return parsed;
  }
}
