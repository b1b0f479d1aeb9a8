import { writeFile } from "fs/promises";
import { join } from "path";
import type { CatalogApi, CatalogPage } from "../lib/catalog";
import type { CommandRunner, RunOptions } from "../lib/download";
import type { Log, Track } from "../lib/types";
import type { VideoHit, VideoSearch } from "../lib/youtube";

export const makeTracks = (n: number, from = 1): Track[] =>
  Array.from({ length: n }, (_, i) => ({
    name: `Song ${from + i}`,
    artists: [`Artist ${from + i}`],
  }));

function page<T>(all: T[], offset: number, size: number): CatalogPage<T> {
  const items = all.slice(offset, offset + size);
  const end = offset + items.length;
  return {
    items,
    next: end < all.length ? `page?offset=${end}` : null,
    offset,
    total: all.length,
  };
}

export type StubCatalogData = {
  playlists?: Record<string, { name: string; items: (Track | null)[] }>;
  albums?: Record<string, { name: string; tracks: Track[] }>;
  pageSize?: number;
};

/** In-memory catalog paging the same way the real service does. */
export class StubCatalog implements CatalogApi {
  calls: string[] = [];
  private readonly pageSize: number;

  constructor(private readonly data: StubCatalogData, private readonly failWith?: unknown) {
    this.pageSize = data.pageSize ?? 100;
  }

  private hit(call: string) {
    this.calls.push(call);
    if (this.failWith !== undefined) throw this.failWith;
  }

  async authorize() {
    this.hit("authorize");
  }

  async playlist(id: string) {
    this.hit(`playlist:${id}`);
    const p = this.data.playlists?.[id];
    if (!p) throw Object.assign(new Error("Resource not found"), { statusCode: 404 });
    return { name: p.name, total: p.items.length };
  }

  async playlistTracks(id: string, offset: number) {
    this.hit(`playlistTracks:${id}:${offset}`);
    const p = this.data.playlists?.[id];
    if (!p) throw Object.assign(new Error("Resource not found"), { statusCode: 404 });
    return page(p.items, offset, this.pageSize);
  }

  async album(id: string) {
    this.hit(`album:${id}`);
    const a = this.data.albums?.[id];
    if (!a) throw Object.assign(new Error("Resource not found"), { statusCode: 404 });
    return { name: a.name, total: a.tracks.length, tracks: page(a.tracks, 0, this.pageSize) };
  }

  async albumTracks(id: string, offset: number) {
    this.hit(`albumTracks:${id}:${offset}`);
    const a = this.data.albums?.[id];
    if (!a) throw Object.assign(new Error("Resource not found"), { statusCode: 404 });
    return page(a.tracks, offset, this.pageSize);
  }
}

/**
 * Deterministic search: the video id is derived from the query. Queries
 * listed in `misses` return nothing, those in `failures` throw.
 */
export class StubSearch implements VideoSearch {
  queries: string[] = [];

  constructor(
    private readonly misses: Set<string> = new Set(),
    private readonly failures: Set<string> = new Set()
  ) {}

  async search(query: string, maxResults: number): Promise<VideoHit[]> {
    this.queries.push(query);
    if (this.failures.has(query)) throw new Error("quotaExceeded");
    if (this.misses.has(query)) return [];
    const id = query.replace(/[^A-Za-z0-9]+/g, "-");
    return [{ videoId: id, title: `${query} (Official Lyrics)` }].slice(0, maxResults);
  }
}

export type RunnerCall = { cmd: string; args: string[]; options: RunOptions };

/**
 * Stands in for yt-dlp: writes one `<n>.m4a` per URL into the cwd it is
 * given, then exits with `exitCode`.
 */
export function stubRunner(exitCode = 0, filesToWrite?: number) {
  const calls: RunnerCall[] = [];
  const runner: CommandRunner = async (cmd, args, options = {}) => {
    calls.push({ cmd, args, options });
    if (args[0] === "--version") return { code: exitCode, stdout: "2024.08.06\n" };
    const urls = args.filter((a) => a.startsWith("https://"));
    const count = filesToWrite ?? urls.length;
    if (options.cwd) {
      for (let i = 0; i < count; i++) {
        await writeFile(join(options.cwd, `track-${String(i + 1).padStart(3, "0")}.m4a`), "audio");
      }
    }
    return { code: exitCode, stdout: "" };
  };
  return { runner, calls };
}

export function captureLog() {
  const lines: { level: "log" | "warn" | "error"; text: string }[] = [];
  const log: Log = {
    log: (...args: unknown[]) => lines.push({ level: "log", text: args.map(String).join(" ") }),
    warn: (...args: unknown[]) => lines.push({ level: "warn", text: args.map(String).join(" ") }),
    error: (...args: unknown[]) => lines.push({ level: "error", text: args.map(String).join(" ") }),
  };
  return { log, lines };
}
