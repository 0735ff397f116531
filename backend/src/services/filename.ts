import path from "path";
import { v4 as uuidv4 } from "uuid";

/**
 * Build a storage name for an uploaded file: a random hex token followed by
 * the original extension (".mp3" for "My Song.mp3", "" for "README").
 * Only the extension is taken from the uploader's name.
 */
export function generateStorageName(originalName: string): string {
  const token = uuidv4().replace(/-/g, "");
  return `${token}${extractExtension(originalName)}`;
}

/**
 * Substring from the last "." of the base name onward, or "" if there is none.
 * Extensions with separators or whitespace are dropped.
 */
export function extractExtension(originalName: string): string {
  const baseName = originalName.split(/[\\/]/).pop() ?? "";
  const ext = path.extname(baseName);
  return /^\.[A-Za-z0-9_-]+$/.test(ext) ? ext : "";
}

/**
 * Recover a UTF-8 filename that the multipart parser decoded as latin1.
 * Names already holding characters above U+00FF (from `filename*=UTF-8''...`)
 * and names that are not valid UTF-8 once re-encoded are returned unchanged.
 */
export function decodeUploadName(name: string): string {
  if (!/[\u0080-\u00ff]/.test(name) || /[^\u0000-\u00ff]/.test(name)) {
    return name;
  }
  const decoded = Buffer.from(name, "latin1").toString("utf8");
  return decoded.includes("\uFFFD") ? name : decoded;
}
