import "dotenv/config";
import express from "express";
import open from "open";
import path from "path";
import SpotifyWebApi from "spotify-web-api-node";
import { saveEnvVar } from "../lib/envFile";
import { errorMessage } from "../lib/errors";

// Mints SPOTIFY_REFRESH_TOKEN so the puller can read private playlists.

const {
  SPOTIFY_CLIENT_ID = "",
  SPOTIFY_CLIENT_SECRET = "",
  SPOTIFY_REDIRECT_URI = "http://127.0.0.1:5173/callback",
} = process.env;

if (!SPOTIFY_CLIENT_ID || !SPOTIFY_CLIENT_SECRET) {
  console.error("Set SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET in .env");
  process.exit(1);
}

const redirect = new URL(SPOTIFY_REDIRECT_URI);
const PORT = Number(redirect.port || 5173);
const scopes = ["playlist-read-private", "playlist-read-collaborative"];

const spotify = new SpotifyWebApi({
  clientId: SPOTIFY_CLIENT_ID,
  clientSecret: SPOTIFY_CLIENT_SECRET,
  redirectUri: SPOTIFY_REDIRECT_URI,
});

const app = express();

app.get("/login", (_req, res) => {
  res.redirect(spotify.createAuthorizeURL(scopes, "playlist-puller", true));
});

app.get(redirect.pathname, async (req, res) => {
  const code = String(req.query.code ?? "");
  if (!code) {
    res.status(400).send("Missing code");
    return;
  }
  try {
    const { body } = await spotify.authorizationCodeGrant(code);
    const envPath = path.join(process.cwd(), ".env");
    saveEnvVar(envPath, "SPOTIFY_REFRESH_TOKEN", body.refresh_token);

    res.send("<h2>Refresh token saved to .env</h2><p>You can close this tab.</p>");
    console.log(`SPOTIFY_REFRESH_TOKEN written to ${envPath}`);
    process.nextTick(() => process.exit(0));
  } catch (e) {
    console.error(`Auth error: ${errorMessage(e)}`);
    res.status(500).send("Auth error. Check console.");
  }
});

app.listen(PORT, () => {
  const loginUrl = `http://${redirect.hostname}:${PORT}/login`;
  console.log(`Minting server on http://${redirect.hostname}:${PORT} …`);
  console.log("Opening browser for Spotify login …");
  open(loginUrl).catch((e: unknown) => {
    console.log(`Could not open a browser (${errorMessage(e)}). Visit ${loginUrl}`);
  });
});
