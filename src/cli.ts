import { createInterface } from "node:readline/promises";
import { Command } from "commander";

import { createConsoleLogger } from "./logger.js";
import type { Logger, OutputSink } from "./logger.js";
import { expandHome, getDefaultWaybarConfigPath, getDefaultWaybarStylePath } from "./paths.js";
import { applyCleanup, applyRestore, applySetup } from "./setup.js";
import type { TemplateSource } from "./templates.js";

export type ConfirmFn = (paths: readonly string[]) => Promise<boolean>;

export interface CliDeps {
  out?: OutputSink;
  err?: OutputSink;
  confirm?: ConfirmFn;
  logger?: Logger;
  templates?: TemplateSource;
}

type FileFlags = {
  config: string;
  style: string;
  dryRun?: boolean;
  yes?: boolean;
};

type SetupFlags = FileFlags & { browser: string[] };

type RestoreFlags = FileFlags & { configBackup?: string; styleBackup?: string };

/** Asks on the terminal before files are rewritten. */
export async function confirmOnTerminal(paths: readonly string[]): Promise<boolean> {
  console.log("This will modify the following files:");
  for (const path of paths) {
    console.log(`- ${path}`);
  }
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = (await rl.question("Proceed? [y/N] ")).trim().toLowerCase();
    return answer === "y" || answer === "yes";
  } finally {
    rl.close();
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function addFileOptions(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Waybar config path", getDefaultWaybarConfigPath())
    .option("--style <path>", "Waybar style path", getDefaultWaybarStylePath())
    .option("--dry-run", "Show what would change without modifying files")
    .option("--yes", "Skip confirmation prompt");
}

export function buildProgram(deps: CliDeps = {}, onExitCode: (code: number) => void = () => {}): Command {
  const out = deps.out ?? console.log;
  const err = deps.err ?? console.error;
  const confirm = deps.confirm ?? confirmOnTerminal;
  const logger = deps.logger ?? createConsoleLogger();

  const program = new Command();
  program
    .name("waybar-ai-usage")
    .description("Waybar AI usage helper and setup tool")
    .configureOutput({
      writeOut: (text) => out(text.replace(/\n$/, "")),
      writeErr: (text) => err(text.replace(/\n$/, "")),
    });

  const guarded = async (flags: FileFlags, run: (config: string, style: string) => void) => {
    const config = expandHome(flags.config);
    const style = expandHome(flags.style);
    if (!flags.yes && !flags.dryRun && !(await confirm([config, style]))) {
      out("Aborted.");
      return;
    }
    try {
      run(config, style);
    } catch (error: unknown) {
      err(`Error: ${error instanceof Error ? error.message : String(error)}`);
      onExitCode(1);
    }
  };

  addFileOptions(
    program.command("setup").description("Add Waybar config entries and styles (with backups)")
  )
    .option(
      "--browser <name>",
      "Browser cookie source to try (repeatable), e.g. --browser chromium",
      collect,
      []
    )
    .action(async (flags: SetupFlags) => {
      await guarded(flags, (configPath, stylePath) => {
        applySetup({
          configPath,
          stylePath,
          dryRun: flags.dryRun === true,
          browsers: flags.browser,
          templates: deps.templates,
          logger,
          out,
        });
      });
    });

  addFileOptions(
    program
      .command("cleanup")
      .description("Remove Waybar config entries and styles added for AI usage modules")
  ).action(async (flags: FileFlags) => {
    await guarded(flags, (configPath, stylePath) => {
      applyCleanup({ configPath, stylePath, dryRun: flags.dryRun === true, logger, out });
    });
  });

  addFileOptions(
    program.command("restore").description("Restore Waybar config and style from backups")
  )
    .option("--config-backup <path>", "Backup to restore the config from (default: latest)")
    .option("--style-backup <path>", "Backup to restore the style from (default: latest)")
    .action(async (flags: RestoreFlags) => {
      await guarded(flags, (configPath, stylePath) => {
        applyRestore({
          configPath,
          stylePath,
          configBackup: flags.configBackup ? expandHome(flags.configBackup) : undefined,
          styleBackup: flags.styleBackup ? expandHome(flags.styleBackup) : undefined,
          dryRun: flags.dryRun === true,
          logger,
          out,
        });
      });
    });

  return program;
}

/**
 * Runs the CLI on `args` (without the node and script entries) and resolves
 * with the exit code.
 */
export async function runCli(args: readonly string[], deps: CliDeps = {}): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });

  if (args.length === 0) {
    program.outputHelp();
    return 0;
  }

  await program.parseAsync([...args], { from: "user" });
  return exitCode;
}
