import process from "node:process";

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { z } from "zod";

import type { SieveConfig } from "./config.js";
import { ReviewError } from "./errors.js";
import { formatZodError } from "./schemas.js";
import { AGENT_MODES, PROVIDER_IDS } from "./types.js";
import { maskSecret } from "./utils.js";

export const COMMANDS = ["scan", "cache", "report", "init", "install-hook", "uninstall"] as const;
export const CACHE_ACTIONS = ["clear", "stats"] as const;

export const ArgsSchema = z
  .object({
    command: z.enum(COMMANDS),
    action: z.enum(CACHE_ACTIONS).optional(),
    all: z.boolean().default(false),
    debug: z.boolean().default(false),
    quiet: z.boolean().default(false),
    config: z.string().trim().min(1, "config cannot be empty").optional(),
    agent: z.enum(AGENT_MODES).optional(),
    provider: z.enum(PROVIDER_IDS).optional(),
    force: z.boolean().default(false),
  })
  .refine((args) => args.command !== "cache" || args.action !== undefined, {
    message: "cache needs an action (clear or stats)",
    path: ["action"],
  })
  .refine((args) => args.agent !== "manual" || args.provider !== undefined, {
    message: "--agent manual needs --provider",
    path: ["provider"],
  });

export type CliOptions = z.infer<typeof ArgsSchema>;

export function parseArgs(args: string[] = hideBin(process.argv)): CliOptions {
  const argv = yargs(args)
    .scriptName("reviewsieve")
    .usage("$0 <command> [options]")
    .command("scan", "Review staged changes before committing.", (command) =>
      command.option("all", {
        type: "boolean",
        description: "Review every change against HEAD, not only staged files.",
        default: false,
      }),
    )
    .command("cache <action>", "Manage the review cache.", (command) =>
      command.positional("action", {
        type: "string",
        choices: CACHE_ACTIONS,
        description: "clear removes every entry; stats prints the entry count.",
      }),
    )
    .command("report", "Print the path of the latest report.")
    .command("init", "Write a default config file in the repository root.", (command) =>
      command
        .option("agent", {
          type: "string",
          choices: AGENT_MODES,
          description: "Review backend to configure.",
        })
        .option("provider", {
          type: "string",
          choices: PROVIDER_IDS,
          description: "Model provider for manual mode.",
        })
        .option("force", {
          type: "boolean",
          description: "Overwrite an existing config file.",
          default: false,
        }),
    )
    .command("install-hook", "Install the git pre-commit hook.")
    .command("uninstall", "Remove the git pre-commit hook.")
    .option("debug", {
      type: "boolean",
      description: "Enable verbose logging.",
      default: false,
    })
    .option("quiet", {
      type: "boolean",
      description: "Only log warnings and errors.",
      default: false,
    })
    .option("config", {
      type: "string",
      description: "Path to a config file (defaults to the nearest .reviewsieverc).",
    })
    .demandCommand(1, "Specify a command.")
    .strict()
    .fail((message, error) => {
      throw new ReviewError(`Invalid CLI arguments: ${error?.message ?? message}`);
    })
    .help()
    .parseSync();

  const parsed = ArgsSchema.safeParse({
    command: argv._[0],
    action: argv.action,
    all: argv.all,
    debug: argv.debug,
    quiet: argv.quiet,
    config: argv.config,
    agent: argv.agent,
    provider: argv.provider,
    force: argv.force,
  });

  if (parsed.success) {
    return parsed.data;
  }
  throw new ReviewError(`Invalid CLI arguments: ${formatZodError(parsed.error)}`);
}

export function redactConfig(config: SieveConfig): Record<string, unknown> {
  const { apiKey, ...rest } = config;
  return { ...rest, apiKey: maskSecret(apiKey) };
}
