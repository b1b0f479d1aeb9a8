import { z } from "zod";
import { ConfigError } from "./errors";

export const REQUIRED_ENV = [
  "SPOTIFY_CLIENT_ID",
  "SPOTIFY_CLIENT_SECRET",
  "YOUTUBE_API_KEY",
] as const;

// Blank values in .env count as missing
const blankToUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const required = z.preprocess(blankToUndefined, z.string().trim());
const optional = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  SPOTIFY_CLIENT_ID: required,
  SPOTIFY_CLIENT_SECRET: required,
  YOUTUBE_API_KEY: required,
  SPOTIFY_REFRESH_TOKEN: optional,
  YTDLP_PATH: z.preprocess(blankToUndefined, z.string().default("yt-dlp")),
  OUTPUT_DIR: optional,
});

export type Config = {
  spotifyClientId: string;
  spotifyClientSecret: string;
  spotifyRefreshToken?: string;
  youtubeApiKey: string;
  ytDlpPath: string;
  outputDir: string;
};

/**
 * Validates the environment before anything touches the network.
 * Throws a ConfigError listing every missing required variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const missing = REQUIRED_ENV.filter((name) =>
      parsed.error.issues.some((issue) => issue.path[0] === name)
    );
    throw new ConfigError(
      missing.length > 0 ? missing : parsed.error.issues.map((i) => String(i.path[0])),
      missing.length > 0 ? undefined : parsed.error.message
    );
  }
  const e = parsed.data;
  return {
    spotifyClientId: e.SPOTIFY_CLIENT_ID,
    spotifyClientSecret: e.SPOTIFY_CLIENT_SECRET,
    spotifyRefreshToken: e.SPOTIFY_REFRESH_TOKEN,
    youtubeApiKey: e.YOUTUBE_API_KEY,
    ytDlpPath: e.YTDLP_PATH,
    outputDir: e.OUTPUT_DIR ?? cwd,
  };
}
