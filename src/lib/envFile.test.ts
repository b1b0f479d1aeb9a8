import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { saveEnvVar, upsertEnvLine } from "./envFile";

describe("upsertEnvLine", () => {
  it("appends to text without a trailing newline", () => {
    expect(upsertEnvLine("A=1", "B", "2")).toBe("A=1\nB=2\n");
  });

  it("replaces an existing value in place", () => {
    expect(upsertEnvLine("A=1\nB=old\nC=3\n", "B", "new")).toBe("A=1\nB=new\nC=3\n");
  });

  it("writes dollar signs in the value literally", () => {
    expect(upsertEnvLine("A=1\nB=old\n", "B", "x$&y$1")).toBe("A=1\nB=x$&y$1\n");
  });

  it("writes into empty text", () => {
    expect(upsertEnvLine("", "B", "2")).toBe("B=2\n");
  });
});

describe("saveEnvVar", () => {
  it("creates the file when missing", async () => {
    const dir = await mkdtemp(join(tmpdir(), "env-"));
    try {
      const envPath = join(dir, ".env");
      saveEnvVar(envPath, "SPOTIFY_REFRESH_TOKEN", "test-refresh");
      saveEnvVar(envPath, "SPOTIFY_REFRESH_TOKEN", "test-refresh-2");
      expect(await readFile(envPath, "utf8")).toBe("SPOTIFY_REFRESH_TOKEN=test-refresh-2\n");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
