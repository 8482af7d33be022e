import { readdir, readFile, writeFile } from "node:fs/promises";
import http from "node:http";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ARCHIVE_FILENAME, type FetchFn, PackageFetcher, withStagingDirectory } from "./fetcher";
import { makeTestConfig, stubFetch, testLogger, useTempDirs } from "./test-support";
import { AppError, pathExists } from "./utils";

const tempDir = useTempDirs();
const servers: http.Server[] = [];

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(
      (server) =>
        new Promise<void>((resolve) => {
          server.closeAllConnections();
          server.close(() => resolve());
        }),
    ),
  );
});

/** Local server that sends headers and a first chunk, then never finishes the body. */
async function stallingServer(): Promise<string> {
  const server = http.createServer((_request, response) => {
    response.writeHead(200, { "content-type": "text/html", "content-length": "1000" });
    response.write("<html>partial");
  });
  servers.push(server);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server has no TCP address");
  }
  return `http://127.0.0.1:${address.port}/bedrock-server.zip`;
}

describe("PackageFetcher.fetchText", () => {
  it("retries server errors", async () => {
    const config = makeTestConfig(await tempDir());
    const { logger } = testLogger();
    let attempts = 0;
    const fetchFn = stubFetch({
      "https://example.test/links": () => {
        attempts += 1;
        return attempts === 1
          ? new Response("busy", { status: 503, statusText: "Service Unavailable" })
          : new Response("payload");
      },
    });
    const fetcher = new PackageFetcher(config, logger, fetchFn);

    const text = await fetcher.fetchText("https://example.test/links", { timeoutMs: 1_000, retries: 2, retryDelayMs: 0 });

    expect(text).toBe("payload");
    expect(attempts).toBe(2);
  });

  it("does not retry client errors", async () => {
    const config = makeTestConfig(await tempDir());
    const { logger } = testLogger();
    const fetchFn = stubFetch({});
    const fetcher = new PackageFetcher(config, logger, fetchFn);

    await expect(
      fetcher.fetchText("https://example.test/missing", { timeoutMs: 1_000, retries: 2, retryDelayMs: 0 }),
    ).rejects.toThrow("Request failed: 404 Not Found (https://example.test/missing)");
    expect(fetchFn.calls).toHaveLength(1);
  });

  it("sends the configured user agent", async () => {
    const config = makeTestConfig(await tempDir(), { BEDROCK_USER_AGENT: "bedrock-manager-test" });
    const { logger } = testLogger();
    const seen: (string | null)[] = [];
    const fetchFn: FetchFn = async (_input, init) => {
      seen.push(new Headers(init?.headers).get("User-Agent"));
      return new Response("ok");
    };

    await new PackageFetcher(config, logger, fetchFn).fetchText("https://example.test/", { timeoutMs: 1_000, retries: 0 });

    expect(seen).toEqual(["bedrock-manager-test"]);
  });
});

describe("PackageFetcher timeouts", () => {
  it("times out a text body that stalls after the headers", async () => {
    const url = await stallingServer();
    const config = makeTestConfig(await tempDir());
    const { logger } = testLogger();

    await expect(new PackageFetcher(config, logger).fetchText(url, { timeoutMs: 1_000, retries: 0 })).rejects.toThrow(
      `Request timed out after 1 seconds: ${url}`,
    );
  });

  it("times out and removes a download that stalls mid-body", async () => {
    const url = await stallingServer();
    const root = await tempDir();
    const config = makeTestConfig(root, { BEDROCK_DOWNLOAD_TIMEOUT_MS: "1000" });
    const { logger } = testLogger();

    await expect(new PackageFetcher(config, logger).download(url, root)).rejects.toThrow(
      `Failed to download server from ${url}: Request timed out after 1 seconds: ${url}`,
    );
    expect(await pathExists(path.join(root, ARCHIVE_FILENAME))).toBe(false);
  });
});

describe("PackageFetcher.validate", () => {
  it("accepts a successful HEAD", async () => {
    const config = makeTestConfig(await tempDir());
    const { logger } = testLogger();
    const fetchFn = stubFetch({ "https://example.test/a.zip": new Response(null, { status: 200 }) });

    expect(await new PackageFetcher(config, logger, fetchFn).validate("https://example.test/a.zip")).toBe(true);
    expect(fetchFn.calls).toEqual([{ url: "https://example.test/a.zip", method: "HEAD" }]);
  });

  it("falls back to a ranged GET when HEAD is not allowed", async () => {
    const config = makeTestConfig(await tempDir());
    const { logger } = testLogger();
    const ranges: (string | null)[] = [];
    const fetchFn: FetchFn = async (_input, init) => {
      if (init?.method === "HEAD") {
        return new Response(null, { status: 405, statusText: "Method Not Allowed" });
      }
      ranges.push(new Headers(init?.headers).get("Range"));
      return new Response("P", { status: 206 });
    };

    expect(await new PackageFetcher(config, logger, fetchFn).validate("https://example.test/a.zip")).toBe(true);
    expect(ranges).toEqual(["bytes=0-0"]);
  });

  it("rejects missing files and network failures", async () => {
    const config = makeTestConfig(await tempDir());
    const { logger } = testLogger();
    const fetchFn = stubFetch({ "https://example.test/down.zip": new Error("ECONNREFUSED") });
    const fetcher = new PackageFetcher(config, logger, fetchFn);

    expect(await fetcher.validate("https://example.test/missing.zip")).toBe(false);
    expect(await fetcher.validate("https://example.test/down.zip")).toBe(false);
  });
});

describe("PackageFetcher.download", () => {
  it("streams the archive into the staging directory", async () => {
    const root = await tempDir();
    const config = makeTestConfig(root);
    const { logger } = testLogger();
    const fetchFn = stubFetch({
      "https://example.test/a.zip": new Response("archive-bytes", { headers: { "content-length": "13" } }),
    });

    const archivePath = await new PackageFetcher(config, logger, fetchFn).download("https://example.test/a.zip", root);

    expect(archivePath).toBe(path.join(root, ARCHIVE_FILENAME));
    expect(await readFile(archivePath, "utf8")).toBe("archive-bytes");
  });

  it("removes a truncated download", async () => {
    const root = await tempDir();
    const config = makeTestConfig(root);
    const { logger } = testLogger();
    const fetchFn = stubFetch({
      "https://example.test/a.zip": new Response("short", { headers: { "content-length": "10" } }),
    });

    await expect(new PackageFetcher(config, logger, fetchFn).download("https://example.test/a.zip", root)).rejects.toThrow(
      "Download incomplete: received 5 B of 10 B.",
    );
    expect(await pathExists(path.join(root, ARCHIVE_FILENAME))).toBe(false);
  });

  it("fails on an error status", async () => {
    const root = await tempDir();
    const config = makeTestConfig(root);
    const { logger } = testLogger();
    const fetchFn = stubFetch({
      "https://example.test/a.zip": new Response("oops", { status: 500, statusText: "Internal Server Error" }),
    });

    const failure = new PackageFetcher(config, logger, fetchFn).download("https://example.test/a.zip", root);
    await expect(failure).rejects.toBeInstanceOf(AppError);
    await expect(failure).rejects.toThrow(
      "Failed to download server from https://example.test/a.zip: 500 Internal Server Error",
    );
  });
});

describe("PackageFetcher.extract", () => {
  it("reports a corrupt archive as a transfer error", async () => {
    const root = await tempDir();
    const config = makeTestConfig(root);
    const { logger } = testLogger();
    const archivePath = path.join(root, ARCHIVE_FILENAME);
    await writeFile(archivePath, "this is not a zip file");

    const failure = new PackageFetcher(config, logger, stubFetch({})).extract(archivePath, root);
    await expect(failure).rejects.toMatchObject({ kind: "transfer" });
    await expect(failure).rejects.toThrow(/^Failed to extract server files: /);
  });
});

describe("withStagingDirectory", () => {
  it("removes the staging directory after success", async () => {
    const root = await tempDir();
    const { logger, sink } = testLogger();

    const staged = await withStagingDirectory(root, logger, async (stagingDir) => {
      await writeFile(path.join(stagingDir, "file"), "x");
      return stagingDir;
    });

    expect(await pathExists(staged)).toBe(false);
    expect(await readdir(root)).toEqual([]);
    expect(sink.messages("INFO").filter((line) => line === "Cleaning up temporary files...")).toHaveLength(1);
  });

  it("removes the staging directory after a failure", async () => {
    const root = await tempDir();
    const { logger, sink } = testLogger();

    await expect(
      withStagingDirectory(root, logger, async () => {
        throw new AppError("install", "boom");
      }),
    ).rejects.toThrow("boom");

    expect(await readdir(root)).toEqual([]);
    expect(sink.messages("INFO").filter((line) => line === "Cleaning up temporary files...")).toHaveLength(1);
  });
});
