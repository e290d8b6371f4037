// CHANGE: Orchestrate catalog, manifest and auxiliary task lists into one mirror pass.
// WHY: Each phase returns its own values; the caller aggregates them instead of sharing counters.

import { CatalogCache } from "./cache.js";
import { fetchCatalog } from "./catalog.js";
import { AUXILIARY_FILES, MANIFESTS, MIRROR, NET, SOURCES } from "./config.js";
import { countRepositoryFiles, planCatalogDownloads } from "./diff.js";
import { defaultIo, executeAll, type DownloadIo } from "./executor.js";
import { describeError, RemoteUnavailable } from "./errors.js";
import { debug, error as logError, info } from "./logger.js";
import { resolveManifest } from "./manifest.js";
import type { DownloadTask, ExecutionReport, ManifestSpec, Package } from "./types.js";
import { downloadTask } from "./utils/layout.js";

export interface MirrorOptions {
  readonly root: string;
  readonly catalogBase: string;
  readonly repoBase: string;
  readonly downloadConcurrency: number;
  readonly pageConcurrency: number;
  readonly pauseMs: number;
  readonly catalogFile?: string;
  readonly refreshCatalog: boolean;
  readonly manifests: readonly ManifestSpec[];
  readonly auxiliaryFiles: readonly string[];
}

export interface MirrorPlan {
  readonly packages: readonly Package[];
  readonly totalRepositoryFiles: number;
  readonly catalogTasks: readonly DownloadTask[];
  readonly manifestTasks: readonly DownloadTask[];
  readonly auxiliaryTasks: readonly DownloadTask[];
  readonly tasks: readonly DownloadTask[];
}

export interface MirrorSummary {
  readonly plan: MirrorPlan;
  readonly report: ExecutionReport;
}

/**
 * Options populated from configuration, with overrides applied on top.
 */
export function resolveMirrorOptions(overrides: Partial<MirrorOptions> = {}): MirrorOptions {
  return {
    root: MIRROR.ROOT,
    catalogBase: SOURCES.CATALOG_BASE,
    repoBase: SOURCES.REPO_BASE,
    downloadConcurrency: NET.DOWNLOAD_CONCURRENCY,
    pageConcurrency: NET.PAGE_CONCURRENCY,
    pauseMs: NET.RATE_LIMIT_PAUSE_MS,
    catalogFile: MIRROR.CATALOG_FILE,
    refreshCatalog: false,
    manifests: MANIFESTS,
    auxiliaryFiles: AUXILIARY_FILES,
    ...overrides
  };
}

/**
 * Obtain the catalog from the local snapshot when present, otherwise from the API.
 */
export async function loadCatalog(options: MirrorOptions): Promise<Package[]> {
  if (options.catalogFile && !options.refreshCatalog) {
    const cached = await new CatalogCache(options.catalogFile).load();
    if (cached) {
      return cached;
    }
  }
  return fetchCatalog({
    catalogBase: options.catalogBase,
    pageConcurrency: options.pageConcurrency,
    pauseMs: options.pauseMs
  });
}

/**
 * Fetch the catalog from the API and store it as the local snapshot.
 */
export async function saveCatalogSnapshot(options: MirrorOptions, filePath: string): Promise<Package[]> {
  const packages = await fetchCatalog({
    catalogBase: options.catalogBase,
    pageConcurrency: options.pageConcurrency,
    pauseMs: options.pauseMs
  });
  await new CatalogCache(filePath).save(packages);
  info(`Saved catalog of ${packages.length} packages as ${filePath}`);
  return packages;
}

/**
 * Tasks for repository files that are refreshed on every run.
 */
export function auxiliaryTasks(options: Pick<MirrorOptions, "root" | "repoBase" | "auxiliaryFiles">): DownloadTask[] {
  return options.auxiliaryFiles.map(relativePath => downloadTask(options.repoBase, options.root, relativePath));
}

/**
 * Resolve every configured manifest. A manifest the repository will not serve
 * contributes no tasks; the rest of the run goes on.
 */
async function resolveAllManifests(options: MirrorOptions): Promise<DownloadTask[]> {
  const perManifest = await Promise.all(
    options.manifests.map(manifest =>
      resolveManifest(manifest.name, manifest.prefix, manifest.suffix, {
        root: options.root,
        repoBase: options.repoBase,
        pauseMs: options.pauseMs
      }).catch((cause: unknown) => {
        if (!(cause instanceof RemoteUnavailable)) {
          throw cause;
        }
        logError(`Skipping manifest ${manifest.name}: ${describeError(cause)}`);
        return [];
      })
    )
  );
  return perManifest.flat();
}

/**
 * Build the complete download list for one run.
 *
 * Catalog loading and manifest resolution run concurrently; the resulting task
 * lists are concatenated without cross-source deduplication. Only a catalog
 * failure rejects the plan.
 */
export async function buildPlan(options: MirrorOptions): Promise<MirrorPlan> {
  const [catalog, manifestTasks] = await Promise.all([
    loadCatalog(options).then(async packages => ({
      packages,
      tasks: await planCatalogDownloads(packages, options.root, options.repoBase)
    })),
    resolveAllManifests(options)
  ]);
  const extraTasks = auxiliaryTasks(options);
  const tasks = [...catalog.tasks, ...manifestTasks, ...extraTasks];
  debug(
    `Plan: ${catalog.tasks.length} catalog, ${manifestTasks.length} manifest, ${extraTasks.length} auxiliary tasks`
  );
  return {
    packages: catalog.packages,
    totalRepositoryFiles: countRepositoryFiles(catalog.packages),
    catalogTasks: catalog.tasks,
    manifestTasks,
    auxiliaryTasks: extraTasks,
    tasks
  };
}

/**
 * Run one full mirror pass: plan, then download everything missing.
 */
export async function mirrorRepository(options: MirrorOptions, io: DownloadIo = defaultIo): Promise<MirrorSummary> {
  const plan = await buildPlan(options);
  info(
    `Downloading ${plan.tasks.length} new files from ${options.repoBase} (from total of ${plan.totalRepositoryFiles})`
  );
  const report = await executeAll(plan.tasks, options.downloadConcurrency, io);
  info(`Mirror complete: ${report.fetched} fetched, ${report.failed} failed, ${report.skipped} skipped.`);
  return { plan, report };
}
