/**
 * Request input validation
 *
 * Plain functions that turn raw request values into typed input or throw
 * one of the 400-class domain errors.
 */

import { AUDIO_CONTENT_TYPE_PREFIX } from "../constants.js";
import { InvalidContentTypeError, ValidationError } from "../errors.js";
import type { TrackFields } from "../types/index.js";

function optionalText(value: unknown, name: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ValidationError(`Invalid ${name}: must be text`);
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

/**
 * Validate an absolute http(s) URL
 */
export function isAbsoluteHttpUrl(value: string): boolean {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }
  return url.protocol === "http:" || url.protocol === "https:";
}

/**
 * Validate the descriptive fields of an upload form.
 * Blank optional fields are treated as absent.
 */
export function validateUploadFields(body: Record<string, unknown>): TrackFields {
  const title = optionalText(body.title, "title");
  if (!title) {
    throw new ValidationError("Title is required");
  }

  const coverUrl = optionalText(body.cover_url, "cover_url");
  if (coverUrl !== undefined && !isAbsoluteHttpUrl(coverUrl)) {
    throw new ValidationError("Invalid cover_url: must be an absolute http(s) URL");
  }

  return {
    title,
    artist: optionalText(body.artist, "artist"),
    album: optionalText(body.album, "album"),
    genre: optionalText(body.genre, "genre"),
    coverUrl,
  };
}

export function isAudioContentType(contentType: string | undefined): contentType is string {
  return !!contentType && contentType.toLowerCase().startsWith(AUDIO_CONTENT_TYPE_PREFIX);
}

/**
 * Throws InvalidContentTypeError unless the declared type is audio/*
 */
export function assertAudioContentType(contentType: string | undefined): asserts contentType is string {
  if (!isAudioContentType(contentType)) {
    throw new InvalidContentTypeError();
  }
}

/**
 * Parse the `limit` query parameter.
 * Returns undefined when absent or 0 (no limit).
 */
export function parseLimit(value: unknown): number | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ValidationError("Invalid limit: must be a number");
  }
  const num = Number(value);
  if (!Number.isInteger(num)) {
    throw new ValidationError("Invalid limit: must be an integer");
  }
  if (num < 0) {
    throw new ValidationError("Invalid limit: must not be negative");
  }
  return num === 0 ? undefined : num;
}
