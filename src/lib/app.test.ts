import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { startApp } from "./app";
import { StubCatalog, StubSearch, captureLog, makeTracks, stubRunner } from "../test/stubs";

const env = {
  SPOTIFY_CLIENT_ID: "test-client-id",
  SPOTIFY_CLIENT_SECRET: "test-secret",
  YOUTUBE_API_KEY: "test-api-key",
};

describe("startApp", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), "app-"));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it("aborts before any network call when a variable is missing", async () => {
    const { runner, calls } = stubRunner();
    const { log, lines } = captureLog();
    const ask = vi.fn(async () => "https://open.spotify.com/album/XYZ");
    const makeCatalog = vi.fn(() => new StubCatalog({}));
    const makeSearch = vi.fn(() => new StubSearch());

    const code = await startApp({
      env: { SPOTIFY_CLIENT_ID: "test-client-id" },
      cwd,
      ask,
      runner,
      log,
      makeCatalog,
      makeSearch,
    });

    expect(code).toBe(1);
    expect(lines.filter((l) => l.level === "error").map((l) => l.text)).toEqual([
      "Missing required environment variables:",
      "  - SPOTIFY_CLIENT_SECRET",
      "  - YOUTUBE_API_KEY",
      "\nCopy .env.example to .env and fill in your API keys.",
    ]);
    expect(calls).toEqual([]);
    expect(ask).not.toHaveBeenCalled();
    expect(makeCatalog).not.toHaveBeenCalled();
    expect(makeSearch).not.toHaveBeenCalled();
  });

  it("stops when yt-dlp is not available", async () => {
    const { log, lines } = captureLog();
    const ask = vi.fn(async () => "");
    const code = await startApp({ env, cwd, ask, runner: stubRunner(127).runner, log });
    expect(code).toBe(1);
    expect(lines).toContainEqual({ level: "error", text: "yt-dlp --version exited with status 127" });
    expect(ask).not.toHaveBeenCalled();
  });

  it("refuses an empty url", async () => {
    const { log, lines } = captureLog();
    const code = await startApp({ env, cwd, ask: async () => "  ", runner: stubRunner().runner, log });
    expect(code).toBe(1);
    expect(lines).toContainEqual({ level: "log", text: "No URL provided!" });
  });

  it("runs the pipeline into the working directory", async () => {
    const { runner, calls } = stubRunner();
    const { log, lines } = captureLog();

    const code = await startApp({
      env,
      cwd,
      ask: async () => "https://open.spotify.com/album/XYZ",
      runner,
      log,
      makeCatalog: () => new StubCatalog({ albums: { XYZ: { name: "Three", tracks: makeTracks(3) } } }),
      makeSearch: () => new StubSearch(),
    });

    expect(code).toBe(0);
    expect(calls.map((c) => c.args[0])).toEqual(["--version", "-f"]);
    expect(calls[1].options.cwd).toBe(join(cwd, "Three"));
    expect(lines).toContainEqual({ level: "log", text: "\nProcess completed successfully! (100% matched)" });
  });

  it("prints the failing stage for invalid input", async () => {
    const { log, lines } = captureLog();
    const code = await startApp({
      env,
      cwd,
      ask: async () => "https://open.spotify.com/track/abc",
      runner: stubRunner().runner,
      log,
      makeCatalog: () => new StubCatalog({}),
      makeSearch: () => new StubSearch(),
    });
    expect(code).toBe(1);
    expect(lines).toContainEqual({
      level: "error",
      text: "\nFailed at Start: Invalid URL format. Please provide a Spotify playlist or album URL.",
    });
  });
});
