import { createInterface } from "readline";
import type { Interface } from "readline";
import { Command, CommanderError } from "commander";
import chalk from "chalk";
import { activateInstalled, SELF_NAME } from "../packages/lifecycle.ts";
import { formatCliError, wrapError } from "../utils/errors.ts";
import { getLogger } from "../utils/logger.ts";
import { registerPackCommands } from "./pack.ts";
import type { SessionHandle } from "./session.ts";

const log = getLogger("shell");

const EXIT_WORDS = new Set(["exit", "quit", ".exit"]);

/** Splits a command line on whitespace, keeping quoted arguments together. */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  for (const match of line.matchAll(pattern)) {
    tokens.push(match[1] ?? match[2] ?? match[3] ?? "");
  }
  return tokens;
}

export function createCommandProgram(session: SessionHandle): Command {
  const program = new Command()
    .name(SELF_NAME)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => process.stdout.write(str),
      writeErr: (str) => process.stderr.write(str),
    });
  registerPackCommands(program, session);
  return program;
}

/**
 * Runs one command line against the session. Never rejects: a failing
 * command is printed and the session goes on.
 */
export async function dispatchLine(session: SessionHandle, line: string): Promise<void> {
  const args = tokenize(line);
  if (args.length === 0) return;

  // A fresh program per line, so concurrent commands never share parse state.
  const program = createCommandProgram(session);
  try {
    await program.parseAsync(args, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander has already written help or the usage problem.
      return;
    }
    const cliErr = wrapError(err);
    log.error(`Command "${line}" failed`, err);
    console.error(formatCliError(cliErr));
  }
}

/**
 * Interactive host: installed packages are loaded at start, then each input
 * line runs as a command. Lines are not serialized, so a slow install does
 * not hold up other commands.
 */
export async function runShell(session: SessionHandle, rl: Interface = createInterface({
  input: process.stdin,
  output: process.stdout,
  prompt: `${SELF_NAME}> `,
})): Promise<void> {
  const { loaded, failed } = await activateInstalled(session.context);
  if (loaded.length > 0) console.log(chalk.dim(`Loaded ${loaded.join(", ")}`));
  for (const { name, error } of failed) {
    console.error(chalk.red(`Could not load ${name}: ${error}`));
  }

  const pending = new Set<Promise<void>>();

  const closed = new Promise<void>((resolve) => rl.once("close", () => resolve()));

  rl.on("line", (line) => {
    if (EXIT_WORDS.has(line.trim())) {
      rl.close();
      return;
    }
    const task = dispatchLine(session, line).then(() => {
      pending.delete(task);
      rl.prompt();
    });
    pending.add(task);
  });

  rl.prompt();
  await closed;
  await Promise.all(pending);
}
