// CHANGE: Commander program exposing download, list and plan commands.
// WHY: Command actions are exported so tests can build the program without parsing process arguments.

import { Command, InvalidArgumentError } from "commander";
import { MIRROR } from "./config.js";
import { describeError } from "./errors.js";
import { error as logError, info, setLogLevel } from "./logger.js";
import { buildPlan, mirrorRepository, resolveMirrorOptions, saveCatalogSnapshot, type MirrorOptions } from "./sync.js";

export interface CommandFlags {
  readonly dest?: string;
  readonly concurrency?: number;
  readonly pageConcurrency?: number;
  readonly catalogFile?: string;
  readonly refresh?: boolean;
  readonly verbose?: boolean;
}

function parsePositive(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Translate command flags into mirror options on top of configuration.
 */
export function optionsFromFlags(flags: CommandFlags): MirrorOptions {
  if (flags.verbose) {
    setLogLevel("debug");
  }
  const overrides: { -readonly [K in keyof MirrorOptions]?: MirrorOptions[K] } = {};
  if (flags.dest !== undefined) {
    overrides.root = flags.dest;
  }
  if (flags.concurrency !== undefined) {
    overrides.downloadConcurrency = flags.concurrency;
  }
  if (flags.pageConcurrency !== undefined) {
    overrides.pageConcurrency = flags.pageConcurrency;
  }
  if (flags.catalogFile !== undefined) {
    overrides.catalogFile = flags.catalogFile;
  }
  if (flags.refresh !== undefined) {
    overrides.refreshCatalog = flags.refresh;
  }
  return resolveMirrorOptions(overrides);
}

/**
 * Download mode entry point: plan and fetch everything missing from the mirror.
 */
export async function downloadAction(flags: CommandFlags): Promise<void> {
  const { report } = await mirrorRepository(optionsFromFlags(flags));
  if (report.failed > 0) {
    logError(`${report.failed} downloads failed; they will be retried on the next run.`);
  }
}

/**
 * List mode entry point: fetch the catalog and save it as the local snapshot.
 */
export async function listAction(flags: CommandFlags): Promise<void> {
  const options = optionsFromFlags(flags);
  const filePath = options.catalogFile ?? MIRROR.CATALOG_FILE;
  await saveCatalogSnapshot(options, filePath);
  info("This will be used when running download if it exists.");
}

/**
 * Plan mode entry point: preview pending downloads without fetching them.
 */
export async function planAction(flags: CommandFlags): Promise<void> {
  const plan = await buildPlan(optionsFromFlags(flags));
  info("Plan: listing first 20 pending downloads.");
  const preview = plan.tasks.slice(0, 20).map((task, idx) => ({
    index: idx + 1,
    source: task.sourceUrl,
    destination: task.destinationPath
  }));
  console.table(preview);
  info(
    `Pending: ${plan.tasks.length} (catalog ${plan.catalogTasks.length}, manifest ${plan.manifestTasks.length}, auxiliary ${plan.auxiliaryTasks.length}); repository total ${plan.totalRepositoryFiles}`
  );
}

function withCatalogOptions(command: Command): Command {
  return command
    .option("-p, --page-concurrency <n>", "catalog pages requested per batch", parsePositive)
    .option("-f, --catalog-file <path>", "catalog snapshot file")
    .option("-v, --verbose", "enable debug logging");
}

function withMirrorOptions(command: Command): Command {
  return withCatalogOptions(
    command
      .option("-d, --dest <dir>", "mirror root directory")
      .option("-c, --concurrency <n>", "parallel file downloads", parsePositive)
  );
}

/**
 * Construct commander program with configured commands.
 */
export function buildProgram(): Command {
  const program = new Command();
  program.name("hexpm-mirror").description("Mirror a Hex package repository onto local storage").version("1.0.0");

  withMirrorOptions(program.command("download"))
    .description("Download every file missing from the mirror")
    .option("-r, --refresh", "ignore the catalog snapshot and query the API")
    .action(async (flags: CommandFlags) => downloadAction(flags));
  withCatalogOptions(program.command("list"))
    .description("Fetch the package catalog and save it as the snapshot file")
    .action(async (flags: CommandFlags) => listAction(flags));
  withMirrorOptions(program.command("plan"))
    .description("Preview pending downloads without fetching")
    .option("-r, --refresh", "ignore the catalog snapshot and query the API")
    .action(async (flags: CommandFlags) => planAction(flags));

  return program;
}

/**
 * Execute CLI with provided argv array.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str)
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`CLI failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
}
