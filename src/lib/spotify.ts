import SpotifyWebApi from "spotify-web-api-node";
import type { CatalogApi, CatalogPage } from "./catalog";
import type { Track } from "./types";

// Spotify caps playlist pages at 100 and album pages at 50
const PLAYLIST_PAGE = 100;
const ALBUM_PAGE = 50;

// API Helper
export function makeSpotify(clientId: string, clientSecret: string) {
  return new SpotifyWebApi({ clientId, clientSecret });
}

const toTrack = (t: { name: string; artists: { name: string }[] }): Track => ({
  name: t.name,
  artists: t.artists.map((a) => a.name),
});

const toPage = <S, T>(body: SpotifyApi.PagingObject<S>, map: (item: S) => T): CatalogPage<T> => ({
  items: body.items.map(map),
  next: body.next,
  offset: body.offset,
  total: body.total,
});

/** CatalogApi backed by the Spotify Web API. */
export class SpotifyCatalog implements CatalogApi {
  constructor(
    private readonly spotify: SpotifyWebApi,
    private readonly refreshToken?: string
  ) {}

  // Uses the refresh token if available, otherwise the client credentials grant
  async authorize(): Promise<void> {
    if (this.refreshToken) {
      this.spotify.setRefreshToken(this.refreshToken);
      const { body } = await this.spotify.refreshAccessToken();
      this.spotify.setAccessToken(body.access_token);
    } else {
      const cc = await this.spotify.clientCredentialsGrant();
      this.spotify.setAccessToken(cc.body.access_token);
    }
  }

  async playlist(id: string) {
    const { body } = await this.spotify.getPlaylist(id, { fields: "name,tracks.total" });
    return { name: body.name, total: body.tracks.total };
  }

  async playlistTracks(id: string, offset: number) {
    const { body } = await this.spotify.getPlaylistTracks(id, { offset, limit: PLAYLIST_PAGE });
    return toPage(body, (item): Track | null => {
      const t = item.track;
      // deleted tracks come back as null; podcast episodes have no artists
      if (!t || !("artists" in t)) return null;
      return toTrack(t);
    });
  }

  async album(id: string) {
    const { body } = await this.spotify.getAlbum(id);
    return {
      name: body.name,
      total: body.total_tracks,
      tracks: toPage(body.tracks, toTrack),
    };
  }

  async albumTracks(id: string, offset: number) {
    const { body } = await this.spotify.getAlbumTracks(id, { offset, limit: ALBUM_PAGE });
    return toPage(body, toTrack);
  }
}
