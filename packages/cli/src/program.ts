/**
 * Command definitions for the paramstore CLI
 */

import { readFileSync } from "node:fs";
import { Command, CommanderError } from "commander";
import {
  deregisterModule,
  listModules,
  logger,
  registerModule,
  type ParameterStore,
} from "@paramstore/sdk";
import { openCliParameters, type CliLocation } from "./lib/store.js";
import { isVerbose } from "./lib/env.js";
import { parseValues } from "./lib/arg.js";
import { processIO, type CliIO } from "./lib/io.js";
import { printJson, printLines, colorize } from "./lib/render.js";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";

export { CliError } from "./lib/errors.js";
export type { CliIO } from "./lib/io.js";

/**
 * Process surroundings a CLI run sees; tests replace all of it
 */
export interface CliContext {
  io: CliIO;
  env: NodeJS.ProcessEnv;
  /** Directory discovery starts from (default: process.cwd()) */
  cwd?: string;
  /** Home directory for discovery and `~` (default: os.homedir()) */
  homeDir?: string;
}

type GlobalOptions = {
  path?: string;
  verbose?: boolean;
  quiet?: boolean;
};

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * Build the command tree for one run
 */
export function createProgram(context: CliContext): Command {
  const { io, env } = context;
  const program = new Command();

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();
  const verbose = (): boolean => Boolean(globals().verbose) || isVerbose(env);
  const location = (): CliLocation => ({
    path: globals().path,
    env,
    cwd: context.cwd,
    homeDir: context.homeDir,
  });
  const say = (message: string): void => {
    if (!globals().quiet) {
      io.out(message + "\n");
    }
  };
  const timed = <T>(label: string, fn: () => Promise<T>): Promise<T> =>
    withTiming(label, { io, verbose: verbose() }, fn);
  const open = (): Promise<ParameterStore> => openCliParameters(location());

  program
    .configureOutput({
      writeOut: (str) => io.out(str),
      writeErr: (str) => io.err(str),
      outputError: (str, write) => write(colorize(str, "red", io.isErrTTY())),
    })
    .exitOverride();

  // Global options
  program
    .name("paramstore")
    .description("Inspect and edit a paramstore settings file")
    .version(readVersion())
    .option("--path <dir>", "Directory holding the settings file")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  program
    .command("init")
    .description("Create (or reset) the settings file with default values")
    .action(async () => {
      await timed("cli.init", async () => {
        const params = await openCliParameters(location(), true);
        say(`Initialized settings at ${params.filePath}`);
      });
    });

  program
    .command("get <key>")
    .description("Print the value of a setting")
    .option("--raw", "Output compact JSON")
    .action(async (key: string, options: { raw?: boolean }) => {
      await timed("cli.get", async () => {
        const params = await open();
        printJson(io, params.get(key), { raw: options.raw });
      });
    });

  program
    .command("set <key> <values...>")
    .description("Set a setting; values are parsed as JSON, several values form a list")
    .action(async (key: string, values: string[]) => {
      await timed("cli.set", async () => {
        const params = await open();
        await params.set(key, parseValues(values));
        say(`Set ${key}`);
      });
    });

  program
    .command("show")
    .description("Describe the settings file")
    .option("--short", "Only print counts")
    .action(async (options: { short?: boolean }) => {
      await timed("cli.show", async () => {
        const params = await open();
        io.out(params.describe({ long: !options.short }));
      });
    });

  program
    .command("keys")
    .description("List setting names")
    .action(async () => {
      await timed("cli.keys", async () => {
        const params = await open();
        printLines(io, params.keys());
      });
    });

  program
    .command("restore-defaults")
    .description("Reset settings that have defaults; keep everything else")
    .action(async () => {
      await timed("cli.restore_defaults", async () => {
        const params = await open();
        await params.restoreDefaults();
        say("Restored default settings");
      });
    });

  program
    .command("reset")
    .description("Drop every setting and start over from defaults")
    .option("--force", "Confirm the reset")
    .action(async (options: { force?: boolean }) => {
      await timed("cli.reset", async () => {
        if (!options.force) {
          throw new CliError("Use --force to confirm reset");
        }
        const params = await open();
        await params.clearAndRestart();
        say(`Reset settings at ${params.filePath}`);
      });
    });

  const modules = program.command("modules").description("Manage registered instrument modules");

  modules
    .command("list")
    .description("List registered modules")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean }) => {
      await timed("cli.modules.list", async () => {
        const entries = listModules(await open());
        if (options.json) {
          printJson(io, entries);
          return;
        }
        printLines(
          io,
          entries.map((entry) => `${entry.platform}/${entry.name} -> ${entry.module}`)
        );
      });
    });

  modules
    .command("add <platform> <name> <module>")
    .description("Register a module under platform/name")
    .option("--overwrite", "Replace an existing registration")
    .action(async (platform: string, name: string, module: string, options: { overwrite?: boolean }) => {
      await timed("cli.modules.add", async () => {
        const params = await open();
        await registerModule(params, { platform, name, module }, { overwrite: options.overwrite });
        say(`Registered ${platform}/${name}`);
      });
    });

  modules
    .command("rm <platform> <name>")
    .description("Remove a registered module")
    .action(async (platform: string, name: string) => {
      await timed("cli.modules.rm", async () => {
        const params = await open();
        await deregisterModule(params, { platform, name });
        say(`Removed ${platform}/${name}`);
      });
    });

  return program;
}

/**
 * Run the CLI and return its exit code
 */
export async function runCli(
  argv: readonly string[],
  context: CliContext = { io: processIO, env: process.env }
): Promise<number> {
  const { io } = context;
  const program = createProgram(context);
  const previousSink = logger.setSink((_level, line) => io.err(line + "\n"));

  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    // Commander already printed its own message (or help/version)
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    const verbose = Boolean(opts.verbose) || isVerbose(context.env);
    io.err(colorize(`Error: ${formatCliError(err, verbose)}`, "red", io.isErrTTY()) + "\n");

    return mapSdkErrorToExitCode(err);
  } finally {
    logger.setSink(previousSink);
  }
}
