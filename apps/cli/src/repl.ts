import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { ContractSession } from "@contract-qa/core";
import { AppError } from "@contract-qa/errors";
import type { Logger } from "@contract-qa/logger";
import { detectMimeType } from "@contract-qa/parser";
import { HELP_TEXT } from "./commands.js";
import type { Command } from "./commands.js";
import { formatError, formatHistory, formatOpened, formatOutcome } from "./format.js";

export interface ReplOutput {
  log(text: string): void;
  error(text: string): void;
}

export interface ReplContext {
  session: ContractSession;
  output: ReplOutput;
  logger: Logger;
}

export async function openFile(session: ContractSession, path: string): Promise<string> {
  const bytes = await readFile(path);
  const opened = await session.open({
    bytes: new Uint8Array(bytes),
    mimeType: detectMimeType(path),
    name: basename(path),
  });
  return formatOpened(opened);
}

async function dispatch(command: Command, { session, output }: ReplContext): Promise<boolean> {
  switch (command.kind) {
    case "empty":
      return true;
    case "exit":
      return false;
    case "help":
      output.log(HELP_TEXT);
      return true;
    case "history":
      output.log(formatHistory(session.history));
      return true;
    case "clear":
      session.clearHistory();
      output.log("Conversation cleared.");
      return true;
    case "open":
      output.log(await openFile(session, command.path));
      return true;
    case "ask": {
      const outcome = await session.ask(command.query);
      output.log(`\n${formatOutcome(outcome)}`);
      return true;
    }
    case "unknown":
      output.error(`Unknown command: /${command.name}. Type /help for commands.`);
      return true;
  }
}

/**
 * Runs one REPL command. Returns false once the user asks to leave. A failing
 * command is reported and the loop carries on with the session as it was.
 */
export async function runCommand(command: Command, ctx: ReplContext): Promise<boolean> {
  try {
    return await dispatch(command, ctx);
  } catch (error: unknown) {
    if (!AppError.isAppError(error)) {
      ctx.logger.error({ err: error, command: command.kind }, "command failed");
    }
    ctx.output.error(formatError(error));
    return true;
  }
}
