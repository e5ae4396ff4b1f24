import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { ReviewError } from "./errors.js";
import { getLogger } from "./logging.js";

const execFileAsync = promisify(execFile);

export type CommandOptions = {
  allowFailure?: boolean;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
};

/**
 * Runs an executable without a shell and returns stdout. With `allowFailure`, a failing or
 * missing command yields `undefined` instead of throwing.
 */
export async function runCommand(
  command: readonly string[],
  options: CommandOptions = {},
): Promise<string | undefined> {
  const [file, ...args] = command;
  const logger = getLogger();
  logger.debug("Running command:", command.join(" "));
  try {
    const { stdout } = await execFileAsync(file, args, {
      env: options.env ?? process.env,
      timeout: options.timeoutMs,
      maxBuffer: 20 * 1024 * 1024,
    });
    return stdout;
  } catch (error) {
    const err = error as NodeJS.ErrnoException & { stderr?: string };
    const detail = err.code === "ENOENT" ? `${file} is not installed` : (err.stderr ?? "").trim();
    if (options.allowFailure) {
      logger.debug("Command allowed to fail:", command.join(" "), detail);
      return undefined;
    }
    logger.error("Command failed:", detail);
    throw new ReviewError(`Command ${command.join(" ")} failed: ${detail || err.message}`);
  }
}
