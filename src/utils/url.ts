/**
 * Join a base URL and a repository-relative path.
 *
 * Each path segment is percent-encoded so package names and versions are sent verbatim.
 *
 * @param base - Base URL, with or without trailing slash.
 * @param relativePath - Slash-separated path inside the repository.
 * @returns Absolute URL.
 */
export function joinUrl(base: string, relativePath: string): string {
  const trimmedBase = base.replace(/\/+$/, "");
  const encoded = relativePath
    .split("/")
    .filter(segment => segment.length > 0)
    .map(segment => encodeURIComponent(segment))
    .join("/");
  return `${trimmedBase}/${encoded}`;
}
