/**
 * Type definitions for the Track Upload API
 */

import type { Readable } from "stream";

/**
 * Track record as stored in the metadata store.
 * Column names match the `tracks` table.
 */
export interface Track {
  id: string;
  title: string;
  artist: string | null;
  album: string | null;
  genre: string | null;
  cover_url: string | null;
  filename: string;
  original_filename: string;
  content_type: string;
  file_size: number;
  created_at: string;
}

/**
 * Track fields supplied to the metadata store on insert.
 * `id` is assigned by the store.
 */
export type NewTrack = Omit<Track, "id">;

/**
 * Descriptive fields accepted from the upload form
 */
export interface TrackFields {
  title: string;
  artist?: string;
  album?: string;
  genre?: string;
  coverUrl?: string;
}

/**
 * Everything the upload orchestrator needs for one upload
 */
export interface UploadInput extends TrackFields {
  content: Buffer;
  contentType: string | undefined;
  originalFilename: string;
}

/**
 * Public JSON shape of a track (GET /api/tracks, GET /api/tracks/:id, upload)
 */
export interface TrackResponse extends Track {
  media_url: string;
}

export interface ListTracksQuery {
  limit?: number;
}

/**
 * Metadata store abstraction
 */
export interface TrackStore {
  insert(track: NewTrack): string;
  list(query?: ListTracksQuery): Track[];
  getById(id: string): Track;
  findByFilename(filename: string): Track | null;
}

/**
 * Blob store abstraction
 */
export interface BlobStorage {
  write(storageName: string, content: Buffer): Promise<number>;
  exists(storageName: string): Promise<boolean>;
  stat(storageName: string): Promise<{ size: number }>;
  createReadStream(storageName: string, range?: ByteRange): Promise<Readable>;
  delete(storageName: string): Promise<void>;
}

export interface ByteRange {
  start: number;
  end: number;
}
