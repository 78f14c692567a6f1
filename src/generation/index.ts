/**
 * Text generation.
 */

export {
  GenerationError,
  type Generator,
  type GenerationRequest,
} from "./generator.js";
export {
  OpenAIGenerator,
  type ChatClient,
  type ChatClientFactory,
  type OpenAIGeneratorOptions,
} from "./openai.js";
