#!/usr/bin/env tsx
import { program } from "commander";
import { registerPackCommands } from "./pack.ts";
import { Session } from "./session.ts";
import type { SessionHandle } from "./session.ts";
import { runShell } from "./shell.ts";
import { SELF_NAME } from "../packages/lifecycle.ts";
import { handleError, setDebug, debug } from "../utils/errors.ts";
import { cliExit } from "../utils/exit.ts";
import { initLogger, getLogger } from "../utils/logger.ts";
import { VERSION } from "../version.ts";

initLogger();
const log = getLogger("cli");

let session: Session | null = null;

/**
 * One-shot commands share a session built on first use; the session is what
 * fetches the verified list, so `--help` never touches the network.
 */
const lazySession: SessionHandle = {
  get context() {
    if (!session) throw new Error("Session used before it was started");
    return session.context;
  },
  async reload() {
    if (!session) throw new Error("Session used before it was started");
    await session.reload();
  },
};

program
  .name(SELF_NAME)
  .description("Install packages from remote repositories into a running host")
  .version(VERSION)
  .option("--debug", "Print debug information on errors")
  .hook("preAction", async (thisCommand, actionCommand) => {
    if (thisCommand.opts().debug) setDebug(true);
    debug("command:", actionCommand.name());
    if (!session) session = await Session.create();
  });

program
  .command("shell")
  .description("Start an interactive host that keeps packages loaded between commands")
  .action(async () => {
    await runShell(lazySession);
  });

registerPackCommands(program, lazySession);

program.parseAsync(process.argv).catch((err: unknown) => {
  log.error("Command failed", err);
  handleError(err, cliExit);
});
