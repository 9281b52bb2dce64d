import "./bootstrap.js";
import { createInterface } from "node:readline/promises";
import type { Interface } from "node:readline/promises";
import { parseEnv, missingCredentials, assertCredentials } from "@contract-qa/config";
import type { AppConfig } from "@contract-qa/types";
import { createContainer } from "./container.js";
import { parseCommand } from "./commands.js";
import { formatError } from "./format.js";
import { openFile, runCommand } from "./repl.js";
import type { ReplContext } from "./repl.js";

function withCredential(config: AppConfig, variable: string, value: string): AppConfig {
  switch (variable) {
    case "OPENAI_API_KEY":
      return { ...config, openai: { ...config.openai, apiKey: value } };
    case "COHERE_API_KEY":
      return { ...config, cohere: { ...config.cohere, apiKey: value } };
    default:
      return config;
  }
}

async function promptForCredentials(config: AppConfig, rl: Interface): Promise<AppConfig> {
  let resolved = config;
  for (const variable of missingCredentials(config)) {
    if (!process.stdin.isTTY) break;
    const value = (await rl.question(`${variable} is not set. Enter it now (leave empty to quit): `)).trim();
    if (value === "") break;
    resolved = withCredential(resolved, variable, value);
  }
  return resolved;
}

async function repl(ctx: ReplContext, rl: Interface): Promise<void> {
  ctx.output.log('Type a question, or "/help" for commands.');
  let running = true;
  while (running) {
    running = await runCommand(parseCommand(await rl.question("\n> ")), ctx);
  }
}

async function main(): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const config = await promptForCredentials(parseEnv(), rl);
    assertCredentials(config);

    const container = createContainer(config);
    const session = container.createSession();

    const ctx: ReplContext = { session, output: console, logger: container.logger };

    const path = process.argv[2];
    if (path) {
      console.log(await openFile(session, path));
    } else {
      console.log("No contract given. Use /open <path> to load one.");
    }

    await repl(ctx, rl);
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
