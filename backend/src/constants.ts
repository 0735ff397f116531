/**
 * Application constants
 *
 * Centralized location for all magic numbers and shared configuration values.
 */

/**
 * Default maximum file size for audio uploads (100MB)
 */
export const MAX_FILE_SIZE_BYTES = 100 * 1024 * 1024;

/**
 * Uploads must declare a content type starting with this prefix
 */
export const AUDIO_CONTENT_TYPE_PREFIX = "audio/";

/**
 * Content type sent for blobs whose track record is missing
 */
export const FALLBACK_CONTENT_TYPE = "application/octet-stream";

/**
 * Path prefix under which blobs are served
 */
export const MEDIA_ROUTE_PREFIX = "/media";

/**
 * API configuration
 */
export const API_CONFIG = {
  /** Port used when PORT is not set */
  DEFAULT_PORT: 8000,
  /** Interface the server binds to when HOST is not set */
  DEFAULT_HOST: "0.0.0.0",
};
