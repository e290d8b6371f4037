// CHANGE: Compute the catalog-derived download list against local disk state.
// WHY: A package whose releases changed has stale metadata too, so its package file is refetched with them.

import fs from "fs-extra";
import pLimit from "p-limit";
import { SOURCES } from "./config.js";
import { debug } from "./logger.js";
import type { DownloadTask, Package } from "./types.js";
import { downloadTask, repositoryPaths } from "./utils/layout.js";

const LOCAL_CHECK_CONCURRENCY = 64;

async function planPackage(pkg: Package, localRoot: string, repoBase: string): Promise<DownloadTask[]> {
  const tasks: DownloadTask[] = [];
  let dirty = false;
  for (const release of pkg.releases) {
    const tarball = downloadTask(repoBase, localRoot, repositoryPaths.tarball(pkg.name, release.version));
    if (!(await fs.pathExists(tarball.destinationPath))) {
      tasks.push(tarball);
      dirty = true;
    }
  }
  const metadata = downloadTask(repoBase, localRoot, repositoryPaths.package(pkg.name));
  if (dirty || !(await fs.pathExists(metadata.destinationPath))) {
    tasks.push(metadata);
  }
  return tasks;
}

/**
 * Determine which tarballs and package files are missing from the mirror.
 *
 * Emits at most `releases + 1` tasks per package, tarballs first, in catalog order.
 *
 * @param packages - Catalog listing.
 * @param localRoot - Mirror root directory.
 * @param repoBase - Repository base URL the tasks download from.
 */
export async function planCatalogDownloads(
  packages: readonly Package[],
  localRoot: string,
  repoBase: string = SOURCES.REPO_BASE
): Promise<DownloadTask[]> {
  const limit = pLimit(LOCAL_CHECK_CONCURRENCY);
  const total = packages.length;
  const progressInterval = Math.max(1, Math.floor(total / 100));
  let processed = 0;
  const reportProgress = () => {
    processed += 1;
    if (processed % progressInterval === 0 || processed === total) {
      debug(`planCatalogDownloads progress: ${processed}/${total}`);
    }
  };
  const perPackage = await Promise.all(
    packages.map(pkg =>
      limit(async () => {
        const tasks = await planPackage(pkg, localRoot, repoBase);
        reportProgress();
        return tasks;
      })
    )
  );
  return perPackage.flat();
}

/**
 * Total number of catalog files in the repository: every release tarball plus one package file each.
 */
export function countRepositoryFiles(packages: readonly Package[]): number {
  return packages.reduce((sum, pkg) => sum + pkg.releases.length + 1, 0);
}
