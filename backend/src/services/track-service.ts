/**
 * Track Service
 *
 * Upload orchestration and the read path for track metadata.
 *
 * Uploads write the blob first and the metadata row last, so a track record
 * never points at a missing blob. If the insert fails the blob is deleted
 * before the error is rethrown.
 */

import { FALLBACK_CONTENT_TYPE } from "../constants.js";
import { AppError, PersistenceError } from "../errors.js";
import { generateStorageName } from "./filename.js";
import { buildMediaUrl } from "./media-url.js";
import { assertAudioContentType } from "./validation.js";
import type {
  BlobStorage,
  ListTracksQuery,
  NewTrack,
  Track,
  TrackResponse,
  TrackStore,
  UploadInput,
} from "../types/index.js";

export interface TrackServiceOptions {
  tracks: TrackStore;
  blobs: BlobStorage;
  publicBaseUrl?: string;
  /** Clock for created_at */
  now?: () => Date;
  /** Storage name source */
  generateName?: (originalName: string) => string;
}

export interface MediaInfo {
  contentType: string;
  originalFilename: string | null;
}

export class TrackService {
  private readonly tracks: TrackStore;
  private readonly blobs: BlobStorage;
  private readonly publicBaseUrl?: string;
  private readonly now: () => Date;
  private readonly generateName: (originalName: string) => string;

  constructor(options: TrackServiceOptions) {
    this.tracks = options.tracks;
    this.blobs = options.blobs;
    this.publicBaseUrl = options.publicBaseUrl;
    this.now = options.now ?? (() => new Date());
    this.generateName = options.generateName ?? generateStorageName;
  }

  /**
   * Store an uploaded audio file and create its track record
   */
  async upload(input: UploadInput): Promise<TrackResponse> {
    // Checked before anything is written
    assertAudioContentType(input.contentType);

    const filename = this.generateName(input.originalFilename);
    const fileSize = await this.blobs.write(filename, input.content);

    const track: NewTrack = {
      title: input.title,
      artist: input.artist ?? null,
      album: input.album ?? null,
      genre: input.genre ?? null,
      cover_url: input.coverUrl ?? null,
      filename,
      original_filename: input.originalFilename,
      content_type: input.contentType,
      file_size: fileSize,
      created_at: this.now().toISOString(),
    };

    let id: string;
    try {
      id = this.tracks.insert(track);
    } catch (error) {
      await this.blobs.delete(filename);
      // PersistenceError and StoreUnavailableError pass through unchanged
      if (error instanceof AppError) throw error;
      throw new PersistenceError("Failed to save track", { cause: error });
    }

    return this.toResponse({ id, ...track });
  }

  /**
   * List tracks newest-first
   */
  list(query: ListTracksQuery = {}): TrackResponse[] {
    return this.tracks.list(query).map((track) => this.toResponse(track));
  }

  getById(id: string): TrackResponse {
    return this.toResponse(this.tracks.getById(id));
  }

  /**
   * Response details for serving a blob. A missing or unreachable record
   * only loses the content type; the blob is still served.
   */
  describeMedia(filename: string): MediaInfo {
    let track: Track | null = null;
    try {
      track = this.tracks.findByFilename(filename);
    } catch (error) {
      console.warn(`Content type lookup failed for ${filename}:`, error);
    }
    return {
      contentType: track?.content_type || FALLBACK_CONTENT_TYPE,
      originalFilename: track?.original_filename ?? null,
    };
  }

  toResponse(track: Track): TrackResponse {
    return {
      id: track.id,
      title: track.title,
      artist: track.artist,
      album: track.album,
      genre: track.genre,
      cover_url: track.cover_url,
      filename: track.filename,
      original_filename: track.original_filename,
      content_type: track.content_type,
      file_size: track.file_size,
      created_at: track.created_at,
      media_url: buildMediaUrl(track.filename, this.publicBaseUrl),
    };
  }
}
