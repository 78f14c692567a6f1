/**
 * Prompt renderer.
 *
 * Takes a ParsedTemplate and a PromptContext and produces the final prompt
 * string:
 *
 *   1. Every {{variable}} in the template MUST exist in the context with a
 *      real value (not the UNSET sentinel).
 *   2. Optionally (strict mode), every set context variable MUST be used.
 *   3. If PromptConstraints are provided, they are appended as a
 *      constraints section the template cannot modify or omit.
 *
 * Rendering is purely mechanical text substitution and constraint injection.
 */

import type { ParsedTemplate } from "./template.js";
import { PLACEHOLDER_RE, getValidVariables, isValidVariable } from "./template.js";
import type { PromptContext } from "./context.js";
import { isUnset } from "./context.js";
import { formatConstraints, type PromptConstraints } from "./constraints.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class PromptRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Cannot render template "${templateName}": context is missing ` +
          `value(s) for: ${missingVariables.join(", ")}`
    );
    this.name = "PromptRenderError";
  }
}

export class UnusedVariableError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly unusedVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" does not use context variable(s): ${unusedVariables.join(", ")}. ` +
          `Pass { strict: false } to allow unused variables.`
    );
    this.name = "UnusedVariableError";
  }
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RenderOptions {
  /**
   * When true (default), rendering fails if the context contains set
   * variables that the template does not reference.
   */
  strict?: boolean;

  /**
   * Constraints appended after substitution, under their own heading.
   * Build these via `buildPromptConstraints()`.
   */
  constraints?: PromptConstraints;
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

/**
 * Render a parsed template against a typed prompt context.
 *
 * @throws PromptRenderError   if any variable is missing or UNSET
 * @throws UnusedVariableError if strict mode is on and context has unused vars
 */
export function renderPrompt(
  template: ParsedTemplate,
  context: PromptContext,
  options: RenderOptions = {}
): string {
  const { strict = true, constraints } = options;
  const templateName = template.name ?? "(anonymous)";

  const missing = template.variables.filter((variable) => isUnset(context[variable]));
  if (missing.length > 0) {
    throw new PromptRenderError(templateName, missing);
  }

  if (strict) {
    const used = new Set<string>(template.variables);
    const unused = getValidVariables().filter(
      (key) => !used.has(key) && !isUnset(context[key])
    );
    if (unused.length > 0) {
      throw new UnusedVariableError(templateName, unused);
    }
  }

  const rendered = template.source.replace(PLACEHOLDER_RE, (match, name: string) =>
    isValidVariable(name) ? context[name] : match
  );

  if (constraints) {
    return rendered.trimEnd() + "\n\n" + formatConstraints(constraints);
  }

  return rendered;
}
