// CHANGE: Paginate the package catalog in fixed-size concurrent batches.
// WHY: The catalog is the source of truth for the whole diff, so a partial listing is never returned.

import { NET, SOURCES } from "./config.js";
import { MalformedCatalogEntry } from "./errors.js";
import { debug, info } from "./logger.js";
import type { JsonValue, Package, Release } from "./types.js";
import { getJson } from "./utils/http.js";
import { catalogPageUrl, isSafeSegment } from "./utils/layout.js";

export interface CatalogOptions {
  readonly catalogBase?: string;
  readonly pageConcurrency?: number;
  readonly pauseMs?: number;
}

export interface CatalogPage {
  readonly page: number;
  readonly packages: readonly Package[];
  readonly rateLimitPauses: number;
}

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRelease(raw: JsonValue, packageName: string, source: string): Release {
  if (!isRecord(raw) || typeof raw.version !== "string") {
    throw new MalformedCatalogEntry(source, `release of ${packageName} has no version`);
  }
  if (!isSafeSegment(raw.version)) {
    throw new MalformedCatalogEntry(source, `release version "${raw.version}" of ${packageName} is not a valid file name`);
  }
  return { version: raw.version };
}

function toPackage(raw: JsonValue, source: string): Package {
  if (!isRecord(raw)) {
    throw new MalformedCatalogEntry(source, "package is not an object");
  }
  if (typeof raw.name !== "string") {
    throw new MalformedCatalogEntry(source, "package has no name");
  }
  const name = raw.name;
  if (!isSafeSegment(name)) {
    throw new MalformedCatalogEntry(source, `package name "${name}" is not a valid file name`);
  }
  if (!Array.isArray(raw.releases)) {
    throw new MalformedCatalogEntry(source, `package ${name} has no releases list`);
  }
  const releases: readonly JsonValue[] = raw.releases;
  return {
    name,
    releases: releases.map(release => toRelease(release, name, source))
  };
}

/**
 * Validate a catalog payload into packages.
 *
 * An absent body (null, undefined or empty string) is an empty page.
 *
 * @param value - Parsed JSON body of a catalog page or snapshot.
 * @param source - URL or file the payload came from, for error messages.
 * @throws MalformedCatalogEntry if the payload or one of its entries has the wrong shape.
 */
export function toPackages(value: JsonValue, source: string): Package[] {
  if (value === null || value === undefined || value === "") {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new MalformedCatalogEntry(source, "expected an array of packages");
  }
  const entries: readonly JsonValue[] = value;
  return entries.map(entry => toPackage(entry, source));
}

/**
 * Fetch one catalog page, pausing and retrying the same page while rate limited.
 *
 * @throws RemoteUnavailable for any non-2xx status other than 429.
 */
export async function fetchCatalogPage(
  page: number,
  options: CatalogOptions & { readonly signal?: AbortSignal } = {}
): Promise<CatalogPage> {
  const url = catalogPageUrl(options.catalogBase ?? SOURCES.CATALOG_BASE, page);
  const response = await getJson<JsonValue>(url, { pauseMs: options.pauseMs, signal: options.signal });
  const packages = toPackages(response.data, url);
  debug(`Catalog page ${page}: ${packages.length} packages after ${response.rateLimitPauses} rate-limit pauses`);
  return { page, packages, rateLimitPauses: response.rateLimitPauses };
}

/**
 * Enumerate every package in the catalog.
 *
 * Pages are requested `pageConcurrency` at a time. The first empty page ends
 * the catalog: pages after it in the same batch are discarded even when they
 * hold data.
 *
 * @throws RemoteUnavailable if any page fails with a non-recoverable status.
 */
export async function fetchCatalog(options: CatalogOptions = {}): Promise<Package[]> {
  const batchSize = Math.max(1, options.pageConcurrency ?? NET.PAGE_CONCURRENCY);
  const packages: Package[] = [];
  let firstPage = 1;
  info(`Downloading catalog metadata (${batchSize} pages per batch)`);

  for (;;) {
    const controller = new AbortController();
    const pageNumbers = Array.from({ length: batchSize }, (_, offset) => firstPage + offset);
    const pages = await Promise.all(
      pageNumbers.map(page =>
        fetchCatalogPage(page, { ...options, signal: controller.signal }).catch((cause: unknown) => {
          controller.abort();
          throw cause;
        })
      )
    );

    const gap = pages.findIndex(page => page.packages.length === 0);
    const usable = gap === -1 ? pages : pages.slice(0, gap);
    for (const page of usable) {
      packages.push(...page.packages);
    }
    if (gap !== -1) {
      const discarded = pages.slice(gap + 1).filter(page => page.packages.length > 0);
      if (discarded.length > 0) {
        debug(
          `Catalog ended at page ${firstPage + gap}; discarded later non-empty pages ${discarded
            .map(page => page.page)
            .join(", ")}`
        );
      }
      break;
    }
    firstPage += batchSize;
  }

  info(`Catalog lists ${packages.length} packages`);
  return packages;
}
