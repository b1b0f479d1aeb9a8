import { google, type youtube_v3 } from "googleapis";

export const MUSIC_CATEGORY_ID = "10";

export type VideoHit = { videoId: string; title: string };

/** Top-N video search, restricted to the Music category. */
export interface VideoSearch {
  search(query: string, maxResults: number): Promise<VideoHit[]>;
}

export function makeYouTube(key: string): youtube_v3.Youtube {
  if (!key) throw new Error("Missing YOUTUBE_API_KEY");
  return google.youtube({ version: "v3", auth: key });
}

export const watchUrl = (videoId: string) => `https://www.youtube.com/watch?v=${videoId}`;

export class YouTubeSearch implements VideoSearch {
  constructor(private readonly yt: youtube_v3.Youtube) {}

  async search(query: string, maxResults: number): Promise<VideoHit[]> {
    const { data } = await this.yt.search.list({
      part: ["snippet"],
      q: query,
      type: ["video"],
      maxResults,
      videoCategoryId: MUSIC_CATEGORY_ID,
    });
    const hits: VideoHit[] = [];
    for (const it of data.items ?? []) {
      const videoId = it.id?.videoId;
      if (!videoId) continue;
      hits.push({ videoId, title: it.snippet?.title ?? "" });
    }
    return hits;
  }
}
