/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  optionalEnvEnum,
  type EnvSource,
} from "./env.js";
import {
  DEFAULT_PIPELINE_CONFIG,
  loadPipelineConfig,
  wikipediaEndpoints,
  type PipelineConfig,
} from "./pipeline/index.js";

export { ConfigError, type EnvSource } from "./env.js";

export * from "./pipeline/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: (typeof ENVIRONMENTS)[number];
  /** Enable debug mode */
  readonly debug: boolean;
  readonly logLevel: (typeof LOG_LEVELS)[number];
  /** Also append log lines to output/logs */
  readonly logToFile: boolean;
  readonly appName: string;
  /** Credential preset from the environment; empty when not provided */
  readonly openaiApiKey: string;
  /** Alternate OpenAI-compatible endpoint */
  readonly openaiBaseUrl: string | undefined;
}

/**
 * Load application configuration from the environment.
 *
 * @throws ConfigError if a variable is present but malformed
 */
export function loadAppConfig(env: EnvSource = process.env): AppConfig {
  const baseUrl = optionalEnv("OPENAI_BASE_URL", "", env);
  return {
    env: optionalEnvEnum("NODE_ENV", ENVIRONMENTS, "development", env),
    debug: optionalEnvBool("DEBUG", false, env),
    logLevel: optionalEnvEnum("LOG_LEVEL", LOG_LEVELS, "info", env),
    logToFile: optionalEnvBool("LOG_TO_FILE", true, env),
    appName: optionalEnv("APP_NAME", "industry-snapshot", env),
    openaiApiKey: optionalEnv("OPENAI_API_KEY", "", env),
    openaiBaseUrl: baseUrl === "" ? undefined : baseUrl,
  };
}

/**
 * Build the frozen pipeline configuration, applying environment overrides
 * on top of the defaults.
 *
 * @throws ConfigError           if an override is malformed
 * @throws PipelineConfigError   if the merged configuration is invalid
 */
export function loadPipelineConfigFromEnv(
  env: EnvSource = process.env
): Readonly<PipelineConfig> {
  const defaults = DEFAULT_PIPELINE_CONFIG.retrieval;
  const topK = optionalEnvInt("RETRIEVAL_TOP_K", defaults.topK, env);
  const language = optionalEnv("WIKIPEDIA_LANGUAGE", defaults.language, env);

  if (topK < 1) {
    throw new ConfigError(`RETRIEVAL_TOP_K must be at least 1, got: ${topK}`);
  }

  return loadPipelineConfig({
    ...DEFAULT_PIPELINE_CONFIG,
    retrieval: {
      ...defaults,
      topK,
      language,
      ...(language === defaults.language ? {} : wikipediaEndpoints(language)),
    },
  });
}
