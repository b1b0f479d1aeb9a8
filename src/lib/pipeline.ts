import { join } from "path";
import { type CatalogApi, resolveCollection } from "./catalog";
import { CSV_FILENAME, buildTable, writeCsv } from "./dataset";
import { type CommandRunner, download, formatDownloadCommand, run } from "./download";
import { PipelineError, toPipelineError } from "./errors";
import { formatSuccessRate, linksOf, resolveAll, successRate } from "./match";
import type { Collection, DownloadReport, Log, ProgressFn, ResultSet } from "./types";
import { createCollectionFolder } from "./utils";
import type { VideoSearch } from "./youtube";

export type Stage =
  | "Start"
  | "CollectionResolved"
  | "FolderReady"
  | "MatchesResolved"
  | "TableWritten"
  | "DownloadComplete";

export type PipelineDeps = {
  catalog: CatalogApi;
  search: VideoSearch;
  runner?: CommandRunner;
  ytDlpPath?: string;
  outputDir: string;
  signal?: AbortSignal;
  onProgress?: ProgressFn;
  log?: Log;
};

type Produced = {
  collection: Collection;
  folder: string;
  csvPath: string;
  results: ResultSet;
  successRate: number;
};

export type PipelineOutcome =
  | ({ status: "complete"; stage: "DownloadComplete"; report: DownloadReport } & Produced)
  | ({ status: "no-links"; stage: "TableWritten" } & Produced)
  | { status: "failed"; stage: Stage; error: PipelineError }
  | { status: "interrupted"; stage: Stage };

const PREVIEW_ROWS = 5;

/**
 * Runs one playlist/album through every stage in order. Failures are returned
 * as an outcome naming the last stage reached, never thrown.
 */
export async function runPipeline(url: string, deps: PipelineDeps): Promise<PipelineOutcome> {
  const { catalog, search, runner = run, ytDlpPath = "yt-dlp", outputDir, signal, onProgress } = deps;
  const log = deps.log ?? console;
  let stage: Stage = "Start";

  try {
    log.log("\nExporting Spotify playlist...");
    const collection = await resolveCollection(catalog, url);
    stage = "CollectionResolved";
    log.log(`${collection.kind === "album" ? "Album" : "Playlist"}: ${collection.name}`);
    log.log(`Total tracks: ${collection.total}`);

    const folder = await createCollectionFolder(outputDir, collection.name, collection.id);
    stage = "FolderReady";
    log.log(`Created folder: ${folder}`);
    log.log(`Successfully exported ${collection.tracks.length} tracks!`);
    for (const t of collection.tracks.slice(0, PREVIEW_ROWS)) {
      log.log(`  ${t.name} - ${t.artists.join(", ")}`);
    }

    log.log("\nStarting YouTube search...");
    const results = await resolveAll(search, collection.tracks, { onProgress, signal, log });
    stage = "MatchesResolved";
    log.log("\nCompleted searches!");

    const csvPath = join(folder, CSV_FILENAME);
    await writeCsv(buildTable(results), csvPath);
    stage = "TableWritten";
    log.log(`\nSaved results to ${csvPath}`);

    const rate = successRate(results);
    log.log(`Success rate: ${formatSuccessRate(rate)}`);
    const produced: Produced = { collection, folder, csvPath, results, successRate: rate };

    const links = linksOf(results);
    if (links.length === 0) {
      log.log("\nNo YouTube links found. Please check your API key and try again.");
      return { status: "no-links", stage, ...produced };
    }

    log.log("\nDownload command is ready:");
    log.log(formatDownloadCommand(links, ytDlpPath));
    log.log(`\nStarting download of ${links.length} songs into ${folder}/`);
    const report = await download(links, folder, { runner, binary: ytDlpPath, signal, log });
    stage = "DownloadComplete";

    log.log(`Download completed. ${report.files.length} audio files in ${folder}:`);
    for (const f of report.files) log.log(`  - ${f}`);
    return { status: "complete", stage, report, ...produced };
  } catch (e) {
    const error = toPipelineError(e, (msg) => new PipelineError("UNEXPECTED", msg));
    if (error.code === "INTERRUPTED") return { status: "interrupted", stage };
    return { status: "failed", stage, error };
  }
}
