// CHANGE: Persist a catalog snapshot so repeated downloads can skip pagination.
// WHY: The snapshot is validated with the same parser as API pages before the planner sees it.

import fs from "fs-extra";
import { toPackages } from "./catalog.js";
import { MIRROR } from "./config.js";
import { MalformedCatalogEntry } from "./errors.js";
import { debug, info } from "./logger.js";
import type { CatalogSnapshot, JsonValue, Package } from "./types.js";

const SNAPSHOT_VERSION = 1;

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Wrapper around the local catalog snapshot with atomic writes.
 */
export class CatalogCache {
  constructor(private readonly filePath: string = MIRROR.CATALOG_FILE) {}

  get path(): string {
    return this.filePath;
  }

  async exists(): Promise<boolean> {
    return fs.pathExists(this.filePath);
  }

  /**
   * Load packages from the snapshot.
   *
   * @returns Packages, or null when no snapshot exists.
   * @throws MalformedCatalogEntry if the snapshot content has the wrong shape.
   */
  async load(): Promise<Package[] | null> {
    if (!(await this.exists())) {
      debug(`Catalog snapshot ${this.filePath} absent.`);
      return null;
    }
    const parsed: JsonValue = await fs.readJson(this.filePath);
    // bare array: concatenated API pages as saved by hand
    if (Array.isArray(parsed)) {
      const packages = toPackages(parsed, this.filePath);
      info(`Loaded ${packages.length} packages from ${this.filePath}`);
      return packages;
    }
    if (!isRecord(parsed) || parsed.version !== SNAPSHOT_VERSION) {
      throw new MalformedCatalogEntry(this.filePath, "unsupported snapshot format");
    }
    const packages = toPackages(parsed.packages, this.filePath);
    info(`Loaded ${packages.length} packages from ${this.filePath}`);
    return packages;
  }

  /**
   * Persist snapshot atomically by writing to temporary file before rename.
   */
  async save(packages: readonly Package[]): Promise<void> {
    const payload: CatalogSnapshot = {
      version: SNAPSHOT_VERSION,
      savedAt: new Date().toISOString(),
      packages
    };
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeJson(tempPath, payload, { spaces: 2 });
    await fs.move(tempPath, this.filePath, { overwrite: true });
    debug(`Catalog snapshot saved with ${packages.length} packages.`);
  }
}
