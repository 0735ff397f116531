import { MEDIA_ROUTE_PREFIX } from "../constants.js";

/**
 * Public URL for a stored blob.
 * Root-relative ("/media/<filename>") unless a public base URL is configured.
 */
export function buildMediaUrl(filename: string, publicBaseUrl?: string): string {
  const relative = `${MEDIA_ROUTE_PREFIX}/${filename}`;
  return publicBaseUrl ? `${publicBaseUrl}${relative}` : relative;
}
