import { InterruptedError, errorMessage } from "./errors";
import type { Log, Match, ProgressFn, ResultSet, Track } from "./types";
import { type VideoSearch, watchUrl } from "./youtube";

export const buildQuery = (t: Track) => {
  const artists = t.artists.join(", ");
  return artists ? `${t.name} lyrics ${artists}` : `${t.name} lyrics`;
};

/**
 * Search the video service for one track and take the first hit.
 * Never rejects: misses and request failures both yield a Match without a link.
 */
export async function resolveMatch(
  search: VideoSearch,
  track: Track,
  log: Log = console
): Promise<Match> {
  const q = buildQuery(track);
  try {
    const [hit] = await search.search(q, 1);
    if (!hit) return { track };
    return { track, videoUrl: watchUrl(hit.videoId), videoTitle: hit.title };
  } catch (e) {
    const reason = errorMessage(e);
    log.warn(`Error searching for '${q}': ${reason}`);
    return { track, error: reason };
  }
}

export type ResolveAllOptions = {
  onProgress?: ProgressFn;
  signal?: AbortSignal;
  log?: Log;
};

/** Resolve every track in order, one request at a time. */
export async function resolveAll(
  search: VideoSearch,
  tracks: readonly Track[],
  { onProgress, signal, log = console }: ResolveAllOptions = {}
): Promise<ResultSet> {
  const results: Match[] = [];
  for (const t of tracks) {
    if (signal?.aborted) throw new InterruptedError("Search interrupted by user");
    results.push(await resolveMatch(search, t, log));
    onProgress?.(results.length, tracks.length);
  }
  return results;
}

export const hasLink = (m: Match): m is Match & { videoUrl: string } => !!m.videoUrl;

export const linksOf = (results: ResultSet): string[] =>
  results.filter(hasLink).map((m) => m.videoUrl);

export const successRate = (results: ResultSet): number =>
  results.length === 0 ? 0 : results.filter(hasLink).length / results.length;

export const formatSuccessRate = (rate: number) => `${Math.round(rate * 100)}%`;
