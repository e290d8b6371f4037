import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RemoteUnavailable } from "../src/errors.js";
import { foldManifestRows, parseManifest, resolveManifest } from "../src/manifest.js";
import { digest } from "../src/utils/hashing.js";
import { httpClient } from "../src/utils/http.js";
import { httpError, makeTempDir, okResponse } from "./helpers.js";

const REPO = "https://repo.test";
const MANIFEST_URL = `${REPO}/installs/hex-1.x.csv`;

describe("parseManifest", () => {
  it("reads headerless target,digest,tool rows and lowercases digests", () => {
    const rows = parseManifest("2.0.0,ABCDEF,1.14.0\r\n\n2.0.1,123456,1.15.0\n");
    expect(rows).toEqual([
      { targetVersion: "2.0.0", digest: "abcdef", toolVersion: "1.14.0" },
      { targetVersion: "2.0.1", digest: "123456", toolVersion: "1.15.0" }
    ]);
  });

  it("skips rows with missing fields or unusable versions", () => {
    const rows = parseManifest("2.0.0,abcdef\n..,abcdef,1.14.0\n2.0.0,abcdef,1.14.0");
    expect(rows).toEqual([{ targetVersion: "2.0.0", digest: "abcdef", toolVersion: "1.14.0" }]);
  });
});

describe("foldManifestRows", () => {
  it("groups rows by destination and accumulates every digest", () => {
    const files = foldManifestRows(
      [
        { targetVersion: "2.0.0", digest: "aa", toolVersion: "1.14.0" },
        { targetVersion: "2.0.0", digest: "bb", toolVersion: "1.14.0" },
        { targetVersion: "2.0.0", digest: "aa", toolVersion: "1.15.0" }
      ],
      { prefix: "hex", suffix: ".ez" },
      "/mirror",
      REPO
    );
    expect(files).toHaveLength(2);
    expect(files[0]?.destinationPath).toBe(path.join("/mirror", "installs", "1.14.0", "hex-2.0.0.ez"));
    expect(files[0]?.sourceUrl).toBe(`${REPO}/installs/1.14.0/hex-2.0.0.ez`);
    expect([...(files[0]?.acceptableDigests ?? [])]).toEqual(["aa", "bb"]);
    expect([...(files[1]?.acceptableDigests ?? [])]).toEqual(["aa"]);
  });
});

describe("resolveManifest", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(root);
  });

  it("excludes files matching any recorded digest and emits the rest", async () => {
    const current = Buffer.from("hex 2.0.0 for elixir 1.14");
    const installed = path.join(root, "installs", "1.14.0", "hex-2.0.0.ez");
    await fs.outputFile(installed, current);
    const stale = path.join(root, "installs", "1.15.0", "hex-2.0.0.ez");
    await fs.outputFile(stale, Buffer.from("corrupted"));

    const csv = [
      `2.0.0,${digest(Buffer.from("older build"), "sha512")},1.14.0`,
      `2.0.0,${digest(current, "sha512").toUpperCase()},1.14.0`,
      `2.0.0,${digest(Buffer.from("hex 2.0.0 for elixir 1.15"), "sha512")},1.15.0`,
      `2.1.0,${digest(Buffer.from("never downloaded"), "sha512")},1.15.0`
    ].join("\n");
    const spy = vi.spyOn(httpClient, "get").mockResolvedValueOnce(okResponse(MANIFEST_URL, csv));

    const tasks = await resolveManifest("hex-1.x", "hex", ".ez", { root, repoBase: REPO });

    expect(spy.mock.calls[0]?.[0]).toBe(MANIFEST_URL);
    expect(tasks).toEqual([
      { sourceUrl: `${REPO}/installs/1.15.0/hex-2.0.0.ez`, destinationPath: stale },
      {
        sourceUrl: `${REPO}/installs/1.15.0/hex-2.1.0.ez`,
        destinationPath: path.join(root, "installs", "1.15.0", "hex-2.1.0.ez")
      }
    ]);
  });

  it("uses installer names without suffix", async () => {
    const csv = `3.22.0,${digest(Buffer.from("rebar"), "sha512")},1.14.0\n`;
    vi.spyOn(httpClient, "get").mockResolvedValueOnce(okResponse(`${REPO}/installs/rebar3-1.x.csv`, csv));

    const tasks = await resolveManifest("rebar3-1.x", "rebar3", "", { root, repoBase: REPO });

    expect(tasks).toEqual([
      {
        sourceUrl: `${REPO}/installs/1.14.0/rebar3-3.22.0`,
        destinationPath: path.join(root, "installs", "1.14.0", "rebar3-3.22.0")
      }
    ]);
  });

  it("fails when the manifest cannot be fetched", async () => {
    vi.spyOn(httpClient, "get").mockRejectedValueOnce(httpError(MANIFEST_URL, 404));
    await expect(resolveManifest("hex-1.x", "hex", ".ez", { root, repoBase: REPO })).rejects.toBeInstanceOf(
      RemoteUnavailable
    );
  });
});
