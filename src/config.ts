// CHANGE: Centralise mirror configuration with environment overrides.
// WHY: Catalog pages and file downloads are throttled independently, so each pool size is its own setting.

import * as dotenv from "dotenv";

dotenv.config();

function positiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Upstream endpoints for the catalog API and the raw file hosting.
 */
export const SOURCES = {
  CATALOG_BASE: process.env.HEXPM_API_URL ?? "https://hex.pm/api",
  REPO_BASE: process.env.HEXPM_REPO_URL ?? "https://repo.hex.pm"
} as const;

/**
 * Network-level configuration for HTTP operations.
 *
 * Invariant: both pool sizes are positive.
 */
export const NET = {
  TIMEOUT: positiveInt(process.env.HTTP_TIMEOUT, 60000),
  DOWNLOAD_CONCURRENCY: positiveInt(process.env.MIRROR_DOWNLOAD_CONCURRENCY, 100),
  PAGE_CONCURRENCY: positiveInt(process.env.MIRROR_PAGE_CONCURRENCY, 25),
  RATE_LIMIT_PAUSE_MS: positiveInt(process.env.MIRROR_RATE_LIMIT_PAUSE_MS, 1000)
} as const;

/**
 * Local mirror layout settings.
 */
export const MIRROR = {
  ROOT: process.env.MIRROR_ROOT ?? "repo.hex.pm",
  CATALOG_FILE: process.env.MIRROR_CATALOG_FILE ?? "hexpm.json"
} as const;

/**
 * Installer manifests whose referenced files are hash-checked.
 */
export const MANIFESTS = [
  { name: "hex-1.x", prefix: "hex", suffix: ".ez" },
  { name: "rebar3-1.x", prefix: "rebar3", suffix: "" }
] as const;

/**
 * Repository files fetched on every run regardless of local state.
 */
export const AUXILIARY_FILES: readonly string[] = [
  "names",
  "versions",
  "public_key",
  ...MANIFESTS.flatMap(manifest => [`installs/${manifest.name}.csv`, `installs/${manifest.name}.csv.signed`])
];
