// CHANGE: Typed failures for catalog, manifest and download phases.
// WHY: Only catalog-level failures abort a run; the executor inspects these classes to keep other failures task-local.

/**
 * Base class for every failure raised by the mirror.
 */
export class MirrorError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Catalog or manifest endpoint answered with a status that cannot be retried.
 */
export class RemoteUnavailable extends MirrorError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, status?: number, options?: { readonly cause?: unknown }) {
    super(`Unable to download ${url} (status ${status ?? "none"})`, options);
    this.url = url;
    this.status = status;
  }
}

export class RateLimited extends MirrorError {
  readonly url: string;

  constructor(url: string) {
    super(`Rate limited by ${url}`);
    this.url = url;
  }
}

/**
 * A single file fetch failed; the run continues.
 */
export class DownloadFailed extends MirrorError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, status?: number, options?: { readonly cause?: unknown }) {
    super(`Download failed for ${url} (status ${status ?? "none"})`, options);
    this.url = url;
    this.status = status;
  }
}

/**
 * Writing a downloaded body to disk was interrupted; the partial file and the destination have been removed.
 */
export class PartialWrite extends MirrorError {
  readonly path: string;

  constructor(path: string, options?: { readonly cause?: unknown }) {
    super(`Removed partially saved file: ${path}`, options);
    this.path = path;
  }
}

/**
 * A destination directory could not be created; tasks writing into it fail.
 */
export class DirectoryUnavailable extends MirrorError {
  readonly path: string;

  constructor(path: string, options?: { readonly cause?: unknown }) {
    super(`Cannot create directory ${path}`, options);
    this.path = path;
  }
}

export class MalformedCatalogEntry extends MirrorError {
  readonly source: string;

  constructor(source: string, detail: string) {
    super(`Malformed catalog entry in ${source}: ${detail}`);
    this.source = source;
  }
}

/**
 * Extract the errno code of a filesystem failure.
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
