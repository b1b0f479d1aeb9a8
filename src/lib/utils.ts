import { mkdir } from "fs/promises";
import { join } from "path";
import { IOError, errorMessage } from "./errors";

export const MAX_FOLDER_NAME = 100;

// Characters Windows rejects in file names
const INVALID_CHARS = /[<>:"/\\|?*]/g;

const trimDotsAndSpaces = (s: string) => s.replace(/^[\s.]+|[\s.]+$/g, "");

// Length is capped in code points so a surrogate pair is never split
const capLength = (s: string) => Array.from(s).slice(0, MAX_FOLDER_NAME).join("");

// Convert a playlist/album name into a folder name
export const sanitizeFolderName = (name: string): string =>
  trimDotsAndSpaces(capLength(trimDotsAndSpaces(name.replace(INVALID_CHARS, "_"))));

/** Creates `<root>/<sanitized name>` (falling back to `fallback` for names that sanitize to nothing). */
export async function createCollectionFolder(root: string, name: string, fallback: string): Promise<string> {
  const folder = join(root, sanitizeFolderName(name) || sanitizeFolderName(fallback));
  try {
    await mkdir(folder, { recursive: true });
  } catch (e) {
    throw new IOError(`Failed to create folder ${folder}: ${errorMessage(e)}`, folder, e);
  }
  return folder;
}
