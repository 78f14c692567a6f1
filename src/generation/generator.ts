/**
 * Generation adapter contract.
 */

import type { Outcome } from "../types/index.js";

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export interface GenerationRequest {
  system: string;
  user: string;
  credential: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
}

export interface Generator {
  /**
   * Produce report text for the prompts. Never throws for service failures
   * and never retries.
   */
  generate(request: GenerationRequest): Promise<Outcome<string, GenerationError>>;
}
