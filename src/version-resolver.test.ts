import { utimes } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { PackageFetcher } from "./fetcher";
import { installFakeServer, makeTestConfig, stubFetch, testLogger, useTempDirs, writeTree } from "./test-support";
import { findLinuxDownloadUrl, isUsableDownloadUrl, parseMetadataFile, VersionResolver } from "./version-resolver";

const tempDir = useTempDirs();

function jsonResponse(payload: unknown): Response {
  return new Response(JSON.stringify(payload), { status: 200, headers: { "content-type": "application/json" } });
}

describe("parseMetadataFile", () => {
  it("reads KEY=value lines and skips comments", () => {
    const values = parseMetadataFile(
      "# Minecraft Bedrock Server Version Information\nVERSION=1.21.50.7\n\nDOWNLOAD_URL=https://example.test/a?b=c\n",
    );
    expect(values).toEqual({ VERSION: "1.21.50.7", DOWNLOAD_URL: "https://example.test/a?b=c" });
  });
});

describe("isUsableDownloadUrl", () => {
  it("rejects empty, null-like and non-http values", () => {
    expect(isUsableDownloadUrl("")).toBe(false);
    expect(isUsableDownloadUrl("null")).toBe(false);
    expect(isUsableDownloadUrl("ftp://example.test/x.zip")).toBe(false);
    expect(isUsableDownloadUrl(42)).toBe(false);
    expect(isUsableDownloadUrl("https://example.test/x.zip")).toBe(true);
  });
});

describe("findLinuxDownloadUrl", () => {
  it("selects the entry matching the download type", () => {
    const payload = {
      result: {
        links: [
          { downloadType: "serverBedrockWindows", downloadUrl: "https://example.test/win/bedrock-server-1.21.50.7.zip" },
          { downloadType: "serverBedrockLinux", downloadUrl: "https://example.test/linux/bedrock-server-1.21.50.7.zip" },
        ],
      },
    };
    expect(findLinuxDownloadUrl(payload, "serverBedrockLinux")).toBe(
      "https://example.test/linux/bedrock-server-1.21.50.7.zip",
    );
  });

  it("returns null for malformed payloads", () => {
    expect(findLinuxDownloadUrl({ result: { links: "nope" } }, "serverBedrockLinux")).toBeNull();
    expect(findLinuxDownloadUrl(null, "serverBedrockLinux")).toBeNull();
    expect(
      findLinuxDownloadUrl({ result: { links: [{ downloadType: "serverBedrockLinux", downloadUrl: "null" }] } }, "serverBedrockLinux"),
    ).toBeNull();
  });
});

describe("VersionResolver.installedVersion", () => {
  it("reports not-installed when the executable is missing", async () => {
    const config = makeTestConfig(await tempDir());
    const { logger } = testLogger();
    const resolver = new VersionResolver(config, logger, new PackageFetcher(config, logger, stubFetch({})));

    expect(await resolver.installedVersion()).toEqual({ kind: "not-installed" });
  });

  it("prefers the metadata file", async () => {
    const config = makeTestConfig(await tempDir());
    await installFakeServer(config, {
      ".installed_version": "# header\nVERSION=1.21.44.1\nINSTALL_DATE=2025-01-06 10:00:00\n",
      "release-notes.txt": "Version 1.20.1.1\n",
    });
    const { logger } = testLogger();
    const resolver = new VersionResolver(config, logger, new PackageFetcher(config, logger, stubFetch({})));

    expect(await resolver.installedVersion()).toEqual({ kind: "known", version: "1.21.44.1" });
    expect(await resolver.readInstallMetadata()).toEqual({
      version: "1.21.44.1",
      installDate: "2025-01-06 10:00:00",
      downloadUrl: null,
    });
  });

  it("falls back to the release notes", async () => {
    const config = makeTestConfig(await tempDir());
    await installFakeServer(config, { "release-notes.txt": "Changelog\nVersion 1.21.30.3 (stable)\n" });
    const { logger } = testLogger();
    const resolver = new VersionResolver(config, logger, new PackageFetcher(config, logger, stubFetch({})));

    expect(await resolver.installedVersion()).toEqual({ kind: "known", version: "1.21.30.3" });
  });

  it("synthesizes a label from the executable's modification date", async () => {
    const config = makeTestConfig(await tempDir());
    await installFakeServer(config);
    const stamp = new Date(2024, 0, 15, 12, 0, 0);
    await utimes(path.join(config.serverDir, config.executable), stamp, stamp);
    const { logger } = testLogger();
    const resolver = new VersionResolver(config, logger, new PackageFetcher(config, logger, stubFetch({})));

    expect(await resolver.installedVersion()).toEqual({ kind: "known", version: "installed-20240115" });
  });
});

describe("VersionResolver.latestRelease", () => {
  it("uses the download links API first", async () => {
    const config = makeTestConfig(await tempDir());
    const { logger } = testLogger();
    const fetchFn = stubFetch({
      [config.download.linksApiUrl]: jsonResponse({
        result: {
          links: [
            { downloadType: "serverBedrockLinux", downloadUrl: "https://example.test/bedrock-server-1.21.50.7.zip" },
          ],
        },
      }),
    });
    const resolver = new VersionResolver(config, logger, new PackageFetcher(config, logger, fetchFn));

    expect(await resolver.latestRelease()).toEqual({
      latest: { kind: "known", version: "1.21.50.7" },
      downloadUrl: "https://example.test/bedrock-server-1.21.50.7.zip",
      source: "api",
    });
    expect(fetchFn.calls.map((call) => call.url)).toEqual([config.download.linksApiUrl]);
  });

  it("keeps the API URL even when it carries no parsable version", async () => {
    const config = makeTestConfig(await tempDir());
    const { logger } = testLogger();
    const fetchFn = stubFetch({
      [config.download.linksApiUrl]: jsonResponse({
        result: { links: [{ downloadType: "serverBedrockLinux", downloadUrl: "https://example.test/latest.zip" }] },
      }),
    });
    const resolver = new VersionResolver(config, logger, new PackageFetcher(config, logger, fetchFn));

    expect(await resolver.latestRelease()).toEqual({
      latest: { kind: "unresolved" },
      downloadUrl: "https://example.test/latest.zip",
      source: "api",
    });
  });

  it("falls through to the download page when the API has no Linux entry", async () => {
    const config = makeTestConfig(await tempDir());
    const { logger } = testLogger();
    const fetchFn = stubFetch({
      [config.download.linksApiUrl]: jsonResponse({
        result: { links: [{ downloadType: "serverBedrockWindows", downloadUrl: "https://example.test/bedrock-server-1.21.50.7.zip" }] },
      }),
      [config.download.pageUrl]: new Response('<a href="https://example.test/bin-linux/bedrock-server-1.21.51.2.zip">'),
    });
    const resolver = new VersionResolver(config, logger, new PackageFetcher(config, logger, fetchFn));

    expect(await resolver.latestRelease()).toEqual({
      latest: { kind: "known", version: "1.21.51.2" },
      downloadUrl: "https://minecraft.azureedge.net/bin-linux/bedrock-server-1.21.51.2.zip",
      source: "scrape",
    });
  });

  it("falls back to the configured URL when every lookup fails", async () => {
    const config = makeTestConfig(await tempDir());
    const { logger, sink } = testLogger();
    const fetchFn = stubFetch({
      [config.download.linksApiUrl]: new Error("getaddrinfo ENOTFOUND"),
      [config.download.pageUrl]: new Response("<html>maintenance</html>"),
    });
    const resolver = new VersionResolver(config, logger, new PackageFetcher(config, logger, fetchFn));

    expect(await resolver.latestRelease()).toEqual({
      latest: { kind: "known", version: "1.21.44.01" },
      downloadUrl: "https://minecraft.azureedge.net/bin-linux/bedrock-server-1.21.44.01.zip",
      source: "configured",
    });
    expect(sink.messages("WARN")).toContain("Failed to fetch from official Minecraft API: getaddrinfo ENOTFOUND");
    expect(sink.messages("WARN")).toContain("Could not automatically detect latest version using any method");
  });

  it("ignores malformed API JSON", async () => {
    const config = makeTestConfig(await tempDir());
    const { logger, sink } = testLogger();
    const fetchFn = stubFetch({
      [config.download.linksApiUrl]: new Response("{not json"),
      [config.download.pageUrl]: new Response("bedrock-server-1.21.51.2"),
    });
    const resolver = new VersionResolver(config, logger, new PackageFetcher(config, logger, fetchFn));

    const release = await resolver.latestRelease();
    expect(release.source).toBe("scrape");
    expect(sink.messages("WARN")).toContain("Official Minecraft API returned malformed JSON");
  });
});

describe("VersionResolver.readInstallMetadata", () => {
  it("returns null without a VERSION entry", async () => {
    const config = makeTestConfig(await tempDir());
    await writeTree(config.serverDir, { ".installed_version": "# empty\nINSTALL_DATE=2025-01-06 10:00:00\n" });
    const { logger } = testLogger();
    const resolver = new VersionResolver(config, logger, new PackageFetcher(config, logger, stubFetch({})));

    expect(await resolver.readInstallMetadata()).toBeNull();
  });
});
