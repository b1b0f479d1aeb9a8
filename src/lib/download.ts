import { spawn } from "child_process";
import { readdir } from "fs/promises";
import { FetchError, IOError, InterruptedError, errorMessage } from "./errors";
import type { DownloadReport, Log } from "./types";

export const AUDIO_FORMAT = "bestaudio[ext=m4a]";
export const AUDIO_EXT = ".m4a";
export const OUTPUT_TEMPLATE = "%(title)s.%(ext)s";

export type RunOptions = {
  cwd?: string;
  signal?: AbortSignal;
  capture?: boolean; // collect stdout instead of echoing it
  log?: Log;
};

// `signal` names the signal that killed the child, when one did
export type RunResult = { code: number | null; signal?: NodeJS.Signals | null; stdout: string };

/** Spawns an external command and resolves with its exit code. */
export type CommandRunner = (cmd: string, args: string[], options?: RunOptions) => Promise<RunResult>;

/**
 * Spawn a command; resolve with its exit status once it exits. Rejects with
 * InterruptedError when `signal` aborts, and with FetchError when the binary
 * cannot be started at all.
 */
export const run: CommandRunner = (cmd, args, { cwd, signal, capture = false, log = console } = {}) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) return reject(new InterruptedError("Download interrupted by user"));

    const p = spawn(cmd, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    const chunks: string[] = [];
    const onAbort = () => p.kill("SIGINT");
    signal?.addEventListener("abort", onAbort, { once: true });

    p.stdout.on("data", (d) => {
      if (capture) chunks.push(d.toString());
      else log.log(`[${cmd}] ${d.toString().trimEnd()}`);
    });
    p.stderr.on("data", (d) => log.error(`[${cmd}] ${d.toString().trimEnd()}`));
    p.on("error", (e) => {
      signal?.removeEventListener("abort", onAbort);
      reject(new FetchError(`Could not start ${cmd}: ${e.message}`, null, e));
    });
    p.on("close", (code, killedBy) => {
      signal?.removeEventListener("abort", onAbort);
      if (signal?.aborted) return reject(new InterruptedError("Download interrupted by user"));
      resolve({ code, signal: killedBy, stdout: chunks.join("") });
    });
  });

const describeExit = (binary: string, { code, signal }: RunResult) =>
  code === null && signal ? `${binary} was killed by ${signal}` : `${binary} exited with status ${code}`;

export type DownloadOptions = {
  runner?: CommandRunner;
  binary?: string;
  signal?: AbortSignal;
  log?: Log;
};

export const downloadArgs = (urls: readonly string[]) => [
  "-f",
  AUDIO_FORMAT,
  "--output",
  OUTPUT_TEMPLATE,
  ...urls,
];

/** Shell-equivalent of the download call, one URL per line. */
export function formatDownloadCommand(urls: readonly string[], binary = "yt-dlp"): string {
  const head = `${binary} -f "${AUDIO_FORMAT}" --output "${OUTPUT_TEMPLATE}"`;
  return [head, ...urls.map((u) => `"${u}"`)].join(" \\\n");
}

export async function listAudioFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir);
    return entries.filter((f) => f.endsWith(AUDIO_EXT)).sort();
  } catch (e) {
    throw new IOError(`Failed to list ${dir}: ${errorMessage(e)}`, dir, e);
  }
}

/**
 * Run yt-dlp once over every URL, writing into `destinationDir`.
 * The child gets `destinationDir` as its cwd; this process never chdirs.
 * Files already written are left in place when yt-dlp fails.
 */
export async function download(
  urls: readonly string[],
  destinationDir: string,
  { runner = run, binary = "yt-dlp", signal, log = console }: DownloadOptions = {}
): Promise<DownloadReport> {
  if (urls.length === 0) return { urls: 0, files: [] };

  const result = await runner(binary, downloadArgs(urls), { cwd: destinationDir, signal, log });
  if (result.code !== 0) {
    throw new FetchError(describeExit(binary, result), result.code);
  }
  return { urls: urls.length, files: await listAudioFiles(destinationDir) };
}

/** Returns the installed yt-dlp version, or rejects if it cannot run. */
export async function probeDownloader(runner: CommandRunner = run, binary = "yt-dlp"): Promise<string> {
  const result = await runner(binary, ["--version"], { capture: true });
  if (result.code !== 0) throw new FetchError(describeExit(`${binary} --version`, result), result.code);
  return result.stdout.trim();
}
