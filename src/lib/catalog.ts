import { CatalogError, InvalidInputError, PipelineError, errorMessage, statusCodeOf } from "./errors";
import type { Collection, CollectionRef, Track } from "./types";

/** One page of a paginated catalog listing. `next` is null on the last page. */
export type CatalogPage<T> = {
  items: T[];
  next: string | null;
  offset: number;
  total: number;
};

/**
 * What the resolver needs from a music catalog. `SpotifyCatalog` is the real
 * implementation; tests provide in-memory ones.
 */
export interface CatalogApi {
  authorize(): Promise<void>;
  playlist(id: string): Promise<{ name: string; total: number }>;
  // null entries are deleted/unavailable tracks
  playlistTracks(id: string, offset: number): Promise<CatalogPage<Track | null>>;
  album(id: string): Promise<{ name: string; total: number; tracks: CatalogPage<Track> }>;
  albumTracks(id: string, offset: number): Promise<CatalogPage<Track>>;
}

const MARKERS = ["album", "playlist"] as const;

export function parseCollectionRef(input: string): CollectionRef {
  const url = input.trim();
  for (const kind of MARKERS) {
    const m =
      url.match(new RegExp(`${kind}/([^?/#\\s]+)`)) ??
      url.match(new RegExp(`^spotify:${kind}:([A-Za-z0-9]+)$`));
    if (m?.[1]) return { kind, id: m[1] };
  }
  return { kind: "invalid", input };
}

async function collectPages<T>(
  first: CatalogPage<T>,
  fetchNext: (offset: number) => Promise<CatalogPage<T>>
): Promise<T[]> {
  const out: T[] = [...first.items];
  let page = first;
  while (page.next) {
    const offset = page.offset + page.items.length;
    page = await fetchNext(offset);
    out.push(...page.items);
    // guard against a cursor that never advances
    if (page.items.length === 0) break;
  }
  return out;
}

async function fetchPlaylist(api: CatalogApi, id: string): Promise<Collection> {
  const meta = await api.playlist(id);
  const first = await api.playlistTracks(id, 0);
  const items = await collectPages(first, (offset) => api.playlistTracks(id, offset));
  const tracks = items.filter((t): t is Track => t !== null);
  return { kind: "playlist", id, name: meta.name, total: meta.total, tracks };
}

async function fetchAlbum(api: CatalogApi, id: string): Promise<Collection> {
  const album = await api.album(id);
  const tracks = await collectPages(album.tracks, (offset) => api.albumTracks(id, offset));
  return { kind: "album", id, name: album.name, total: album.total, tracks };
}

/**
 * Resolve a playlist or album URL into its ordered track list.
 * Rejects with InvalidInputError before any request when the URL has neither
 * marker, and with CatalogError for anything the catalog reports.
 */
export async function resolveCollection(api: CatalogApi, url: string): Promise<Collection> {
  const ref = parseCollectionRef(url);
  if (ref.kind === "invalid") throw new InvalidInputError(ref.input);

  try {
    await api.authorize();
    return ref.kind === "album" ? await fetchAlbum(api, ref.id) : await fetchPlaylist(api, ref.id);
  } catch (e) {
    if (e instanceof PipelineError) throw e;
    const status = statusCodeOf(e);
    const what = status === 404 ? "not found" : errorMessage(e);
    throw new CatalogError(
      `Could not load ${ref.kind} ${ref.id}: ${what}${status ? ` (HTTP ${status})` : ""}`,
      status,
      e
    );
  }
}
