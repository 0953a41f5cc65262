/** Ends a one-shot command with the given exit code. */
export const cliExit = (code = 0): never => {
  process.exit(code);
};
