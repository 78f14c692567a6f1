#!/usr/bin/env node
/**
 * Entry point for the industry snapshot pipeline.
 *
 * One-shot:
 *   npm start -- --industry "Electric Vehicles" [--api-key <key>] [--model <name>] [--json]
 *
 * Interactive (no --industry):
 *   npm start
 *
 *   A line not starting with "/" is an industry submission. Commands:
 *     /key <value>    set the API credential for this session
 *     /model <name>   choose the generation model
 *     /rerun          re-evaluate the current session without resubmitting
 *     /quit           exit
 *
 * Exit codes:
 *   0 - Report generated (or interactive session ended)
 *   1 - Configuration error, or the one-shot run produced no report
 */

import { realpathSync } from "node:fs";
import { createInterface } from "node:readline";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import { parseCommand } from "./cli/commands.js";
import {
  ConfigError,
  PipelineConfigError,
  loadAppConfig,
  loadPipelineConfigFromEnv,
  type AppConfig,
  type PipelineConfig,
} from "./config/index.js";
import { OpenAIGenerator } from "./generation/index.js";
import { createLogger, initSessionId, type Logger } from "./logging/index.js";
import { PromptBuilder } from "./prompts/index.js";
import { WikipediaRetriever } from "./retrieval/index.js";
import {
  StepController,
  createSession,
  renderSession,
  type CycleResult,
} from "./session/index.js";
import type { Session } from "./types/index.js";

export interface CliArgs {
  industry: string | undefined;
  apiKey: string | undefined;
  model: string | undefined;
  json: boolean;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      industry: { type: "string" },
      "api-key": { type: "string" },
      model: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  return {
    industry: values.industry,
    apiKey: values["api-key"],
    model: values.model,
    json: values.json ?? false,
    help: values.help ?? false,
  };
}

const USAGE = `
Usage: industry-snapshot [options]

  --industry <name>   Generate one report and exit
  --api-key <key>     OpenAI API key (default: OPENAI_API_KEY)
  --model <name>      Generation model (default: from configuration)
  --json              Print the session as JSON (one-shot only)
  -h, --help          Show this help message

Without --industry an interactive session starts; type /quit to leave.
`;

/**
 * Wire the production adapters into a controller.
 */
export function createController(
  app: AppConfig,
  pipeline: Readonly<PipelineConfig>,
  logger: Logger
): StepController {
  return new StepController({
    retriever: new WikipediaRetriever({ settings: pipeline.retrieval, logger }),
    generator: new OpenAIGenerator({
      baseURL: app.openaiBaseUrl,
      fixedTemperatureModels: pipeline.generation.fixedTemperatureModels,
      logger,
    }),
    prompts: new PromptBuilder(pipeline),
    config: pipeline,
    logger,
  });
}

/**
 * JSON view of a session after a cycle.
 */
export function toJson(session: Session, result: CycleResult): string {
  return JSON.stringify(
    {
      step: session.step,
      industry: session.industry,
      sources: session.documents ?? [],
      report: session.report,
      notices: result.notices,
      ...(result.inspection ? { inspection: result.inspection } : {}),
    },
    null,
    2
  );
}

async function runOnce(
  controller: StepController,
  args: CliArgs,
  credential: string
): Promise<number> {
  const session = createSession();
  const result = await controller.generate(session, {
    industry: args.industry ?? "",
    credential,
    model: args.model,
  });

  console.log(
    args.json ? toJson(session, result) : renderSession(session, result.notices, { color: useColors() })
  );
  return session.report === null ? 1 : 0;
}

async function runInteractive(
  controller: StepController,
  args: CliArgs,
  presetCredential: string
): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const session = createSession();
  const color = useColors();
  let credential = presetCredential;
  let model = args.model;

  console.log(renderSession(session, [], { color }));
  if (credential === "") {
    console.log("Set your OpenAI API key with /key <value>.");
  }
  rl.setPrompt("\nIndustry> ");
  rl.prompt();

  for await (const raw of rl) {
    const command = parseCommand(raw);

    if (command.kind === "quit") {
      break;
    }

    switch (command.kind) {
      case "key":
        credential = command.credential;
        console.log("API key set.");
        break;
      case "model":
        model = command.model;
        console.log(`Model set to ${model}.`);
        break;
      case "usage":
        console.log(command.message);
        break;
      case "rerun": {
        const result = await controller.advance(session, { credential, model });
        console.log(renderSession(session, result.notices, { color }));
        break;
      }
      case "industry": {
        const result = await controller.generate(session, {
          industry: command.industry,
          credential,
          model,
        });
        console.log(renderSession(session, result.notices, { color }));
        break;
      }
    }

    rl.prompt();
  }

  rl.close();
}

function useColors(): boolean {
  return process.stdout.isTTY === true && !process.env.NO_COLOR;
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const sessionId = initSessionId();
  const app = loadAppConfig();
  const pipeline = loadPipelineConfigFromEnv();
  const logger = createLogger({
    level: app.logLevel,
    console: app.debug,
    file: app.logToFile,
  });

  logger.info("Application starting", {
    sessionId,
    env: app.env,
    model: args.model ?? pipeline.generation.defaultModel,
    topK: pipeline.retrieval.topK,
    language: pipeline.retrieval.language,
  });

  const controller = createController(app, pipeline, logger);
  const credential = args.apiKey ?? app.openaiApiKey;

  if (args.industry !== undefined) {
    return runOnce(controller, args, credential);
  }

  await runInteractive(controller, args, credential);
  logger.info("Session ended");
  return 0;
}

// Only run when executed directly (not imported by tests)
const entry = process.argv[1];
const isDirectExecution =
  entry !== undefined && realpathSync(entry) === fileURLToPath(import.meta.url);

if (isDirectExecution) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      if (err instanceof PipelineConfigError) {
        console.error(err.format());
      } else if (err instanceof ConfigError) {
        console.error(`Configuration error: ${err.message}`);
      } else {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      }
      process.exitCode = 1;
    }
  );
}
