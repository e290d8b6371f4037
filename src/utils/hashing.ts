import { createHash } from "crypto";

export type DigestAlgorithm = "md5" | "sha1" | "sha256" | "sha512";

const ALGORITHM_BY_HEX_LENGTH: ReadonlyMap<number, DigestAlgorithm> = new Map([
  [32, "md5"],
  [40, "sha1"],
  [64, "sha256"],
  [128, "sha512"]
]);

/**
 * Infer the digest algorithm from the length of a hex digest.
 *
 * @param hexDigest - Digest as recorded by a manifest.
 * @returns Matching algorithm, or undefined for unknown lengths and non-hex input.
 */
export function digestAlgorithmFor(hexDigest: string): DigestAlgorithm | undefined {
  if (!/^[0-9a-f]+$/i.test(hexDigest)) {
    return undefined;
  }
  return ALGORITHM_BY_HEX_LENGTH.get(hexDigest.length);
}

/**
 * Compute the lowercase hex digest of a buffer.
 */
export function digest(buffer: Buffer, algorithm: DigestAlgorithm): string {
  return createHash(algorithm).update(buffer).digest("hex");
}
