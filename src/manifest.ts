// CHANGE: Resolve installer manifests into hash-checked download tasks.
// WHY: One installer path can be listed under several digests across manifest revisions; matching any of them means the file is current.

import { fetchManifestText } from "./api.js";
import { MIRROR, SOURCES } from "./config.js";
import { debug, info } from "./logger.js";
import type { DownloadTask, ManifestRow, ManifestSpec, UniqueManifestFile } from "./types.js";
import { downloadTask, isSafeSegment, repositoryPaths } from "./utils/layout.js";
import { verifyAny } from "./verify.js";

export interface ManifestOptions {
  readonly root?: string;
  readonly repoBase?: string;
  readonly pauseMs?: number;
}

/**
 * Parse headerless manifest rows of `targetVersion,digest,toolVersion`.
 *
 * Blank lines and rows with fewer than three fields are skipped; extra fields are ignored.
 */
export function parseManifest(text: string): ManifestRow[] {
  const rows: ManifestRow[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === "") {
      continue;
    }
    const [targetVersion, digest, toolVersion] = line.split(",").map(field => field.trim());
    if (!targetVersion || !digest || !toolVersion) {
      debug(`Skipping malformed manifest row: ${line}`);
      continue;
    }
    if (!isSafeSegment(targetVersion) || !isSafeSegment(toolVersion)) {
      debug(`Skipping manifest row with unusable version: ${line}`);
      continue;
    }
    rows.push({ targetVersion, digest: digest.toLowerCase(), toolVersion });
  }
  return rows;
}

/**
 * Fold manifest rows into one entry per destination, accumulating every digest seen for it.
 *
 * Entries keep the order in which their destination first appeared.
 */
export function foldManifestRows(
  rows: readonly ManifestRow[],
  spec: Pick<ManifestSpec, "prefix" | "suffix">,
  root: string,
  repoBase: string
): UniqueManifestFile[] {
  const files = new Map<string, { readonly task: DownloadTask; readonly digests: Set<string> }>();
  for (const row of rows) {
    const relativePath = repositoryPaths.install(row.toolVersion, spec.prefix, row.targetVersion, spec.suffix);
    const task = downloadTask(repoBase, root, relativePath);
    const existing = files.get(task.destinationPath);
    if (existing) {
      existing.digests.add(row.digest);
    } else {
      files.set(task.destinationPath, { task, digests: new Set([row.digest]) });
    }
  }
  return Array.from(files.values(), ({ task, digests }) => ({
    destinationPath: task.destinationPath,
    sourceUrl: task.sourceUrl,
    acceptableDigests: digests
  }));
}

/**
 * Select the manifest files that are absent or match none of their acceptable digests.
 */
export async function staleManifestFiles(files: readonly UniqueManifestFile[]): Promise<DownloadTask[]> {
  const tasks: DownloadTask[] = [];
  for (const file of files) {
    if (await verifyAny(file.destinationPath, file.acceptableDigests)) {
      debug(`Up to date: ${file.destinationPath}`);
      continue;
    }
    tasks.push({ sourceUrl: file.sourceUrl, destinationPath: file.destinationPath });
  }
  return tasks;
}

/**
 * Download a manifest and return tasks for the installer files it references that need fetching.
 *
 * @param manifestName - Manifest name without extension, e.g. `hex-1.x`.
 * @param prefix - File name prefix of referenced installers.
 * @param suffix - File name suffix of referenced installers.
 * @throws RemoteUnavailable when the manifest itself cannot be fetched.
 */
export async function resolveManifest(
  manifestName: string,
  prefix: string,
  suffix: string,
  options: ManifestOptions = {}
): Promise<DownloadTask[]> {
  const root = options.root ?? MIRROR.ROOT;
  const repoBase = options.repoBase ?? SOURCES.REPO_BASE;
  const text = await fetchManifestText(manifestName, repoBase, { pauseMs: options.pauseMs });
  const rows = parseManifest(text);
  const files = foldManifestRows(rows, { prefix, suffix }, root, repoBase);
  const tasks = await staleManifestFiles(files);
  info(`Manifest ${manifestName}: ${tasks.length} of ${files.length} files need downloading`);
  return tasks;
}
