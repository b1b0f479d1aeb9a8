export type Track = {
  readonly name: string;
  readonly artists: readonly string[];
};

export type CollectionKind = "playlist" | "album";

// Parsed once from the pasted URL
export type CollectionRef =
  | { kind: "playlist"; id: string }
  | { kind: "album"; id: string }
  | { kind: "invalid"; input: string };

export type Collection = {
  readonly kind: CollectionKind;
  readonly id: string;
  readonly name: string;
  readonly total: number; // as reported by the catalog
  readonly tracks: readonly Track[];
};

export type Match = {
  readonly track: Track;
  readonly videoUrl?: string;
  readonly videoTitle?: string;
  readonly error?: string; // why the search degraded, if it did
};

export type ResultSet = readonly Match[];

export const TABLE_COLUMNS = [
  "Track Name",
  "Artist Name(s)",
  "YouTube Link",
  "YouTube Video Title",
] as const;

export type TableRow = [string, string, string, string];

export type Table = {
  columns: typeof TABLE_COLUMNS;
  rows: TableRow[];
};

export type DownloadReport = {
  urls: number;
  files: string[];
};

/** Subset of `console` the pipeline writes to. */
export type Log = Pick<Console, "log" | "warn" | "error">;

export type ProgressFn = (done: number, total: number) => void;
