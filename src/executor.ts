// CHANGE: Bounded worker pool that downloads tasks and reports a per-task outcome.
// WHY: A destination is either absent or fully written after a run; partial bodies never stay on disk.

import path from "node:path";
import fs from "fs-extra";
import pLimit from "p-limit";
import { getFile } from "./api.js";
import { NET } from "./config.js";
import { describeError, DirectoryUnavailable, DownloadFailed, PartialWrite } from "./errors.js";
import { debug, error as logError, info } from "./logger.js";
import type { DownloadTask, ExecutionReport, TaskOutcome } from "./types.js";
import { responseStatus } from "./utils/http.js";

const PARTIAL_SUFFIX = ".part";

/**
 * Network and disk operations used by the executor.
 */
export interface DownloadIo {
  readonly fetch: (url: string) => Promise<Buffer>;
  readonly write: (filePath: string, data: Buffer) => Promise<void>;
}

export const defaultIo: DownloadIo = {
  fetch: getFile,
  write: (filePath, data) => fs.writeFile(filePath, data)
};

export interface PreparedDirectories {
  readonly ready: number;
  readonly sweptPartials: number;
  readonly failures: ReadonlyMap<string, DirectoryUnavailable>;
}

async function sweepPartials(directory: string): Promise<number> {
  const leftovers = (await fs.readdir(directory)).filter(entry => entry.endsWith(PARTIAL_SUFFIX));
  await Promise.all(leftovers.map(entry => fs.remove(path.join(directory, entry))));
  return leftovers.length;
}

/**
 * Create every distinct destination directory before any worker starts, and
 * drop `.part` files an interrupted earlier run left in them.
 *
 * A directory that cannot be prepared is reported instead of thrown, so only
 * the tasks writing into it fail.
 */
export async function prepareDirectories(tasks: readonly DownloadTask[]): Promise<PreparedDirectories> {
  const directories = new Set(tasks.map(task => path.dirname(task.destinationPath)));
  const failures = new Map<string, DirectoryUnavailable>();
  let sweptPartials = 0;
  for (const directory of directories) {
    try {
      await fs.ensureDir(directory);
      sweptPartials += await sweepPartials(directory);
    } catch (cause) {
      logError(`Cannot prepare ${directory}: ${describeError(cause)}`);
      failures.set(directory, new DirectoryUnavailable(directory, { cause }));
    }
  }
  return { ready: directories.size - failures.size, sweptPartials, failures };
}

async function runTask(task: DownloadTask, io: DownloadIo): Promise<TaskOutcome> {
  let body: Buffer;
  try {
    body = await io.fetch(task.sourceUrl);
  } catch (cause) {
    return {
      task,
      status: "failed",
      error: new DownloadFailed(task.sourceUrl, responseStatus(cause), { cause })
    };
  }

  const partialPath = `${task.destinationPath}${PARTIAL_SUFFIX}`;
  try {
    await io.write(partialPath, body);
    await fs.move(partialPath, task.destinationPath, { overwrite: true });
  } catch (cause) {
    // the destination may hold an older copy; removing it forces a refetch next run
    for (const leftover of [partialPath, task.destinationPath]) {
      await fs.remove(leftover).catch((removeError: unknown) => {
        logError(`Could not remove ${leftover}: ${describeError(removeError)}`);
      });
    }
    return { task, status: "failed", error: new PartialWrite(task.destinationPath, { cause }) };
  }
  return { task, status: "fetched", bytes: body.byteLength };
}

/**
 * Download every task with at most `concurrency` requests in flight.
 *
 * A destination listed more than once is fetched for its first task only;
 * later tasks for it are reported as skipped. Failures never abort the batch:
 * a directory that cannot be created fails only the tasks that write into it.
 *
 * @param tasks - Download list.
 * @param concurrency - Worker pool size.
 * @param io - Network and disk operations.
 * @returns Outcomes in submission order plus aggregate counts.
 */
export async function executeAll(
  tasks: readonly DownloadTask[],
  concurrency: number = NET.DOWNLOAD_CONCURRENCY,
  io: DownloadIo = defaultIo
): Promise<ExecutionReport> {
  const prepared = await prepareDirectories(tasks);
  debug(
    `Prepared ${prepared.ready} directories for ${tasks.length} tasks, removed ${prepared.sweptPartials} stale partial files`
  );

  const limit = pLimit(Math.max(1, concurrency));
  const scheduled = new Set<string>();
  const total = tasks.length;
  let completed = 0;

  const outcomes = await Promise.all(
    tasks.map(task => {
      if (scheduled.has(task.destinationPath)) {
        debug(`Skipping duplicate destination ${task.destinationPath}`);
        return Promise.resolve<TaskOutcome>({ task, status: "skipped" });
      }
      scheduled.add(task.destinationPath);
      const directoryFailure = prepared.failures.get(path.dirname(task.destinationPath));
      return limit(async () => {
        const outcome: TaskOutcome = directoryFailure
          ? { task, status: "failed", error: directoryFailure }
          : await runTask(task, io);
        completed += 1;
        if (outcome.status === "fetched") {
          info(`Downloaded [${completed}/${total}]: ${task.sourceUrl}`);
        } else {
          logError(`Failed [${completed}/${total}]: ${describeError(outcome.error)}`);
        }
        return outcome;
      });
    })
  );

  return {
    outcomes,
    fetched: outcomes.filter(outcome => outcome.status === "fetched").length,
    failed: outcomes.filter(outcome => outcome.status === "failed").length,
    skipped: outcomes.filter(outcome => outcome.status === "skipped").length
  };
}
