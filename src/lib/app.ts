import type { CatalogApi } from "./catalog";
import { type Config, loadConfig } from "./config";
import { type CommandRunner, probeDownloader, run } from "./download";
import { ConfigError, errorMessage } from "./errors";
import { formatSuccessRate } from "./match";
import { runPipeline } from "./pipeline";
import { SpotifyCatalog, makeSpotify } from "./spotify";
import type { Log, ProgressFn } from "./types";
import { type VideoSearch, YouTubeSearch, makeYouTube } from "./youtube";

export type AppIO = {
  env: Record<string, string | undefined>;
  cwd: string;
  ask: (prompt: string) => Promise<string>;
  runner?: CommandRunner;
  signal?: AbortSignal;
  onProgress?: ProgressFn;
  log?: Log;
  // client factories; the defaults talk to Spotify and YouTube
  makeCatalog?: (config: Config) => CatalogApi;
  makeSearch?: (config: Config) => VideoSearch;
};

const spotifyCatalog = (c: Config) =>
  new SpotifyCatalog(makeSpotify(c.spotifyClientId, c.spotifyClientSecret), c.spotifyRefreshToken);

const youtubeSearch = (c: Config) => new YouTubeSearch(makeYouTube(c.youtubeApiKey));

/** The interactive run: env check, yt-dlp probe, prompt, pipeline. Resolves with the exit code. */
export async function startApp(io: AppIO): Promise<number> {
  const {
    runner = run,
    log = console,
    makeCatalog = spotifyCatalog,
    makeSearch = youtubeSearch,
  } = io;

  log.log("Spotify Playlist to YouTube Downloader");
  log.log("=".repeat(50));

  let config: Config;
  try {
    config = loadConfig(io.env, io.cwd);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    log.error("Missing required environment variables:");
    for (const name of e.missing) log.error(`  - ${name}`);
    log.error("\nCopy .env.example to .env and fill in your API keys.");
    return 1;
  }

  try {
    const version = await probeDownloader(runner, config.ytDlpPath);
    log.log(`yt-dlp is installed (version: ${version})`);
  } catch (e) {
    log.error(errorMessage(e));
    log.error("Please install yt-dlp: https://github.com/yt-dlp/yt-dlp#installation");
    return 1;
  }

  const url = (await io.ask("Paste your Spotify playlist URL: ")).trim();
  if (!url) {
    log.log("No URL provided!");
    return 1;
  }

  const outcome = await runPipeline(url, {
    catalog: makeCatalog(config),
    search: makeSearch(config),
    runner,
    ytDlpPath: config.ytDlpPath,
    outputDir: config.outputDir,
    signal: io.signal,
    onProgress: io.onProgress,
    log,
  });

  switch (outcome.status) {
    case "complete":
      log.log(`\nProcess completed successfully! (${formatSuccessRate(outcome.successRate)} matched)`);
      return 0;
    case "no-links":
      log.log(`\nNothing to download. Results saved to ${outcome.csvPath}`);
      return 1;
    case "interrupted":
      log.log(`\nInterrupted by user after stage ${outcome.stage}.`);
      return 1;
    case "failed":
      log.error(`\nFailed at ${outcome.stage}: ${outcome.error.message}`);
      return 1;
  }
}
