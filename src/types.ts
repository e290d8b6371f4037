// CHANGE: Strongly typed domain models for the mirror pipeline.
// WHY: Catalog JSON is validated into these shapes at parse time instead of being read field by field later.

import type { MirrorError } from "./errors.js";

/**
 * JSON-like value type used for untrusted payloads without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * One published version of a package.
 */
export interface Release {
  readonly version: string;
}

/**
 * Package listed by the catalog API. Identity is `name`.
 *
 * @property releases - Versions in the order the catalog lists them.
 */
export interface Package {
  readonly name: string;
  readonly releases: readonly Release[];
}

/**
 * A single `(source, destination)` download unit.
 */
export interface DownloadTask {
  readonly sourceUrl: string;
  readonly destinationPath: string;
}

/**
 * One row of an installer manifest: `targetVersion,digest,toolVersion`.
 *
 * @property targetVersion - Version of the installable (hex, rebar3).
 * @property toolVersion - Elixir version the build targets.
 */
export interface ManifestRow {
  readonly targetVersion: string;
  readonly digest: string;
  readonly toolVersion: string;
}

/**
 * Installer manifest location and the file naming of its entries.
 */
export interface ManifestSpec {
  readonly name: string;
  readonly prefix: string;
  readonly suffix: string;
}

/**
 * A manifest-referenced file after folding every row that points at it.
 *
 * Invariant: `acceptableDigests` holds lowercased hex digests and is never empty.
 */
export interface UniqueManifestFile {
  readonly destinationPath: string;
  readonly sourceUrl: string;
  readonly acceptableDigests: ReadonlySet<string>;
}

export type TaskStatus = "fetched" | "failed" | "skipped";

/**
 * Result of one executor task.
 *
 * @property bytes - Body size for fetched tasks.
 * @property error - Cause for failed tasks.
 */
export interface TaskOutcome {
  readonly task: DownloadTask;
  readonly status: TaskStatus;
  readonly bytes?: number;
  readonly error?: MirrorError;
}

/**
 * Aggregated executor result. `outcomes` follows submission order.
 */
export interface ExecutionReport {
  readonly outcomes: readonly TaskOutcome[];
  readonly fetched: number;
  readonly failed: number;
  readonly skipped: number;
}

/**
 * Shape of the local catalog snapshot file.
 */
export interface CatalogSnapshot {
  readonly version: number;
  readonly savedAt: string;
  readonly packages: readonly Package[];
}
