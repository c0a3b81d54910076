/**
 * assist-deploy engine -- Versioned Artifact Fetcher Tests
 *
 * The bucket is an in-memory FakeRemote; the fallback store is a real
 * directory tree under the OS temp dir.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  ChecksumMismatchError,
  DownloadError,
  ManifestError,
  ResolutionError,
} from "../src/errors";
import { LocalFallbackStore } from "../src/fallback-store";
import { VersionedArtifactFetcher } from "../src/fetcher";
import { PointerSource, StageSources } from "../src/types";
import {
  FakeRemote,
  makeTempDir,
  manifestJson,
  sha256,
  silentLogger,
  writeTree,
} from "./helpers";

const BINARY = "fake assistant binary 2.0.1";

let workDir: string;
let localDir: string;
let downloadDir: string;
let remote: FakeRemote;
let reported: Array<[keyof StageSources, PointerSource, string]>;

function createFetcher(): VersionedArtifactFetcher {
  return new VersionedArtifactFetcher({
    remote,
    fallback: new LocalFallbackStore(localDir),
    download_dir: downloadDir,
    binary_name: "claude",
    logger: silentLogger,
    onSource: (stage, source, detail) => reported.push([stage, source, detail]),
  });
}

beforeEach(() => {
  workDir = makeTempDir("fetcher");
  localDir = path.join(workDir, "local");
  downloadDir = path.join(workDir, "downloads");
  remote = new FakeRemote();
  reported = [];
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

describe("resolveVersion", () => {
  it("reads the channel pointer from the bucket", async () => {
    remote.files.set("latest", "2.0.14\n");
    const resolved = await createFetcher().resolveVersion("latest");

    expect(resolved).toEqual({
      requested: "latest",
      version: "2.0.14",
      source: "remote",
    });
    expect(reported).toEqual([["pointer", "remote", "2.0.14"]]);
  });

  it("falls back to the local pointer when the bucket is unreachable", async () => {
    remote.offline = true;
    writeTree(localDir, "latest", "1.2.3");

    const resolved = await createFetcher().resolveVersion("latest");
    expect(resolved.version).toBe("1.2.3");
    expect(resolved.source).toBe("local_fallback");
    expect(remote.requests).toEqual(["latest"]);
  });

  it("looks up the stable channel under its own name", async () => {
    remote.files.set("stable", "1.9.0");
    remote.files.set("latest", "2.0.14");

    const resolved = await createFetcher().resolveVersion("stable");
    expect(resolved.version).toBe("1.9.0");
    expect(remote.requests).toEqual(["stable"]);
  });

  it("fails when neither source has a pointer", async () => {
    remote.offline = true;
    const promise = createFetcher().resolveVersion("latest");

    await expect(promise).rejects.toBeInstanceOf(ResolutionError);
    await expect(promise).rejects.toThrow(
      `no local pointer at ${path.join(localDir, "latest")}`,
    );
  });

  it("returns a concrete version untouched without any request", async () => {
    remote.offline = true;
    const resolved = await createFetcher().resolveVersion("2.0.1");

    expect(resolved).toEqual({
      requested: "2.0.1",
      version: "2.0.1",
      source: "pinned",
    });
    expect(remote.requests).toEqual([]);
  });

  it("rejects a target that is neither a channel nor a version", async () => {
    await expect(createFetcher().resolveVersion("../etc")).rejects.toThrow(
      'Invalid target "../etc": expected stable, latest or a version like 1.2.3',
    );
    expect(remote.requests).toEqual([]);
  });

  it("rejects a pointer that does not contain a version", async () => {
    remote.files.set("latest", "<html>maintenance</html>");
    await expect(createFetcher().resolveVersion("latest")).rejects.toThrow(
      'Pointer "latest" (remote) does not contain a version: "<html>maintenance</html>"',
    );
  });
});

describe("fetchManifest", () => {
  it("fetches the manifest from the bucket", async () => {
    remote.files.set("2.0.1/manifest.json", manifestJson("2.0.1", { "linux-x64": BINARY }));

    const fetched = await createFetcher().fetchManifest("2.0.1");
    expect(fetched.source).toBe("remote");
    expect(fetched.manifest.platforms["linux-x64"].checksum).toBe(sha256(BINARY));
  });

  it("uses the local manifest when the bucket has none", async () => {
    writeTree(localDir, "2.0.1/manifest.json", manifestJson("2.0.1", { "win32-x64": BINARY }));

    const fetched = await createFetcher().fetchManifest("2.0.1");
    expect(fetched.source).toBe("local_fallback");
    expect(Object.keys(fetched.manifest.platforms)).toEqual(["win32-x64"]);
    expect(reported).toEqual([
      ["manifest", "local_fallback", path.join(localDir, "2.0.1", "manifest.json")],
    ]);
  });

  it("fails when neither source has a manifest", async () => {
    await expect(createFetcher().fetchManifest("2.0.1")).rejects.toBeInstanceOf(
      ManifestError,
    );
  });

  it("does not fall back when the bucket serves a malformed manifest", async () => {
    remote.files.set("2.0.1/manifest.json", "{ not json");
    writeTree(localDir, "2.0.1/manifest.json", manifestJson("2.0.1", { "linux-x64": BINARY }));

    await expect(createFetcher().fetchManifest("2.0.1")).rejects.toThrow(
      "Manifest from https://releases.example.test/assistant/2.0.1/manifest.json is not valid JSON",
    );
  });
});

describe("downloadAndVerify", () => {
  const entry = { platform: "linux-x64", checksum: sha256(BINARY) };

  it("downloads and verifies the platform binary", async () => {
    remote.files.set("2.0.1/linux-x64/claude", BINARY);
    const fetcher = createFetcher();

    const artifact = await fetcher.downloadAndVerify("2.0.1", entry);
    expect(artifact).toEqual({
      file_path: path.join(downloadDir, "claude-2.0.1-linux-x64"),
      checksum: sha256(BINARY),
      version: "2.0.1",
      platform: "linux-x64",
      source: "remote",
      bytes: Buffer.byteLength(BINARY),
    });
    expect(fs.readFileSync(artifact.file_path, "utf-8")).toBe(BINARY);
  });

  it("copies from the fallback store when the download fails", async () => {
    writeTree(localDir, "2.0.1/linux-x64/claude", BINARY);

    const artifact = await createFetcher().downloadAndVerify("2.0.1", entry);
    expect(artifact.source).toBe("local_fallback");
    expect(reported).toEqual([
      ["binary", "local_fallback", path.join(localDir, "2.0.1", "linux-x64", "claude")],
    ]);
  });

  it("names Windows artifacts with the .exe extension", async () => {
    remote.files.set("2.0.1/win32-x64/claude.exe", BINARY);
    const artifact = await createFetcher().downloadAndVerify("2.0.1", {
      platform: "win32-x64",
      checksum: sha256(BINARY),
    });
    expect(path.basename(artifact.file_path)).toBe("claude-2.0.1-win32-x64.exe");
  });

  it("fails with a DownloadError naming both sources", async () => {
    const promise = createFetcher().downloadAndVerify("2.0.1", entry);

    await expect(promise).rejects.toBeInstanceOf(DownloadError);
    await expect(promise).rejects.toThrow(
      /^Binary claude for linux-x64 unavailable: remote \(HTTP 404 for .*\); local fallback \(No local binary at .*\)$/,
    );
    expect(fs.existsSync(path.join(downloadDir, "claude-2.0.1-linux-x64"))).toBe(false);
  });

  it("reports an unusable download directory as a DownloadError", async () => {
    remote.files.set("2.0.1/linux-x64/claude", BINARY);
    fs.writeFileSync(downloadDir, "not a directory");

    const promise = createFetcher().downloadAndVerify("2.0.1", entry);
    await expect(promise).rejects.toBeInstanceOf(DownloadError);
    await expect(promise).rejects.toMatchObject({ stage: "DOWNLOADING" });
    await expect(promise).rejects.toThrow(
      `Cannot create download directory ${downloadDir}: `,
    );
    expect(remote.requests).toEqual([]);
  });

  it("deletes a binary whose checksum does not match", async () => {
    remote.files.set("2.0.1/linux-x64/claude", "tampered bytes");
    const fetcher = createFetcher();

    const promise = fetcher.downloadAndVerify("2.0.1", entry);
    await expect(promise).rejects.toBeInstanceOf(ChecksumMismatchError);
    await expect(promise).rejects.toMatchObject({
      kind: "CHECKSUM_MISMATCH",
      expected: sha256(BINARY),
      actual: sha256("tampered bytes"),
    });
    expect(fs.existsSync(fetcher.artifactPath("2.0.1", "linux-x64"))).toBe(false);
  });

  it("never substitutes the fallback copy after a mismatch", async () => {
    remote.files.set("2.0.1/linux-x64/claude", "tampered bytes");
    writeTree(localDir, "2.0.1/linux-x64/claude", BINARY);

    await expect(createFetcher().downloadAndVerify("2.0.1", entry)).rejects.toBeInstanceOf(
      ChecksumMismatchError,
    );
    expect(reported).toEqual([
      ["binary", "remote", "https://releases.example.test/assistant/2.0.1/linux-x64/claude"],
    ]);
  });

  it("calls onVerifying between download and hashing", async () => {
    remote.files.set("2.0.1/linux-x64/claude", BINARY);
    const events: string[] = [];
    await createFetcher().downloadAndVerify("2.0.1", entry, {
      onVerifying: () => events.push("verifying"),
    });
    expect(events).toEqual(["verifying"]);
  });
});
