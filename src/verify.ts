import fs from "fs-extra";
import { describeError, getErrnoCode } from "./errors.js";
import { debug } from "./logger.js";
import { digest, digestAlgorithmFor, type DigestAlgorithm } from "./utils/hashing.js";

/**
 * Check whether the file at `filePath` matches any of the given hex digests.
 *
 * The file is read once and hashed at most once per algorithm. A missing or
 * unreadable file is a normal "not verified" outcome and never throws.
 *
 * @param filePath - Local file to check.
 * @param digests - Acceptable hex digests, compared case-insensitively.
 */
export async function verifyAny(filePath: string, digests: Iterable<string>): Promise<boolean> {
  const wanted = new Map<DigestAlgorithm, Set<string>>();
  for (const candidate of digests) {
    const normalised = candidate.trim().toLowerCase();
    const algorithm = digestAlgorithmFor(normalised);
    if (!algorithm) {
      debug(`Unrecognised digest "${candidate}" for ${filePath}`);
      continue;
    }
    const bucket = wanted.get(algorithm) ?? new Set<string>();
    bucket.add(normalised);
    wanted.set(algorithm, bucket);
  }
  if (wanted.size === 0) {
    return false;
  }

  let content: Buffer;
  try {
    content = await fs.readFile(filePath);
  } catch (error) {
    const code = getErrnoCode(error);
    if (code !== "ENOENT") {
      debug(`Cannot read ${filePath} for verification: ${describeError(error)}`);
    }
    return false;
  }

  for (const [algorithm, accepted] of wanted) {
    if (accepted.has(digest(content, algorithm))) {
      return true;
    }
  }
  return false;
}

/**
 * Report whether `filePath` exists and its content hashes to `expected`.
 */
export async function verify(filePath: string, expected: string): Promise<boolean> {
  return verifyAny(filePath, [expected]);
}
