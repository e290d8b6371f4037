// CHANGE: Raw file retrieval against the repository host.
// WHY: Keeps request details out of the planner and executor, which only see URLs and buffers.

import { debug } from "./logger.js";
import { getBinary, getText, type RequestOptions } from "./utils/http.js";
import { joinUrl } from "./utils/url.js";
import { repositoryPaths } from "./utils/layout.js";

/**
 * Download a repository file payload as Buffer.
 *
 * @param url - Direct download URL.
 * @returns Buffer with file content.
 */
export async function getFile(url: string): Promise<Buffer> {
  const response = await getBinary(url);
  debug(`Fetched ${url} with status ${response.status} (${response.data.byteLength} bytes)`);
  return response.data;
}

/**
 * Download the CSV text of an installer manifest.
 *
 * @param manifestName - Manifest name without extension, e.g. `hex-1.x`.
 * @param repoBase - Repository base URL.
 * @throws RemoteUnavailable when the manifest cannot be fetched.
 */
export async function fetchManifestText(
  manifestName: string,
  repoBase: string,
  options: RequestOptions = {}
): Promise<string> {
  const url = joinUrl(repoBase, repositoryPaths.manifest(manifestName));
  const response = await getText(url, options);
  debug(`Fetched manifest ${url} with status ${response.status}`);
  return response.data;
}
