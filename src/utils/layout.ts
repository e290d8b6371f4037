import path from "node:path";
import sanitize from "sanitize-filename";
import type { DownloadTask } from "../types.js";
import { joinUrl } from "./url.js";

/**
 * Repository-relative locations. The mirror keeps the origin's layout, so the
 * same relative path addresses a file remotely and on disk.
 */
export const repositoryPaths = {
  tarball: (name: string, version: string): string => `tarballs/${name}-${version}.tar`,
  package: (name: string): string => `packages/${name}`,
  manifest: (manifestName: string): string => `installs/${manifestName}.csv`,
  install: (toolVersion: string, prefix: string, targetVersion: string, suffix: string): string =>
    `installs/${toolVersion}/${prefix}-${targetVersion}${suffix}`
} as const;

// Device names sanitize-filename strips for Windows; plain file names on the mirror host.
const RESERVED_DEVICE_NAME = /^(con|prn|aux|nul|com[0-9]|lpt[0-9])(\..*)?$/i;

/**
 * Whether a catalog or manifest value can be used verbatim as one path segment.
 */
export function isSafeSegment(value: string): boolean {
  if (value.length === 0 || value === "." || value === "..") {
    return false;
  }
  return sanitize(value) === value || RESERVED_DEVICE_NAME.test(value);
}

/**
 * Local path of a repository-relative file under the mirror root.
 */
export function localPath(root: string, relativePath: string): string {
  return path.join(root, ...relativePath.split("/"));
}

/**
 * Build the download task for one repository-relative file.
 */
export function downloadTask(repoBase: string, root: string, relativePath: string): DownloadTask {
  return {
    sourceUrl: joinUrl(repoBase, relativePath),
    destinationPath: localPath(root, relativePath)
  };
}

export function catalogPageUrl(catalogBase: string, page: number): string {
  return `${joinUrl(catalogBase, "packages")}?page=${page}`;
}
