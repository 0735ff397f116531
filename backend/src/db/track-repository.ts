/**
 * Track Repository
 *
 * SQLite-backed metadata store for track records. Identifiers are UUIDs
 * assigned here on insert.
 */

import { v4 as uuidv4, validate as uuidValidate } from "uuid";
import type { DatabaseManager, Database } from "./database.js";
import {
  AppError,
  InvalidIdError,
  NotFoundError,
  PersistenceError,
} from "../errors.js";
import type { ListTracksQuery, NewTrack, Track, TrackStore } from "../types/index.js";

/**
 * Throws InvalidIdError unless `id` is a well-formed track id
 */
export function assertTrackId(id: string): void {
  if (!uuidValidate(id)) {
    throw new InvalidIdError();
  }
}

export class TrackRepository implements TrackStore {
  constructor(private readonly database: DatabaseManager) {}

  /**
   * Get database connection from the shared database manager.
   * Throws StoreUnavailableError when the database is not open.
   */
  private getDb(): Database.Database {
    return this.database.getConnection();
  }

  /**
   * Insert a track and return its new id.
   * The row is committed when this returns.
   */
  insert(track: NewTrack): string {
    const db = this.getDb();
    const id = uuidv4();

    try {
      db.prepare(`
        INSERT INTO tracks (
          id, title, artist, album, genre, cover_url,
          filename, original_filename, content_type, file_size, created_at
        ) VALUES (
          @id, @title, @artist, @album, @genre, @cover_url,
          @filename, @original_filename, @content_type, @file_size, @created_at
        )
      `).run({ id, ...track });
    } catch (error) {
      throw new PersistenceError("Failed to save track", { cause: error });
    }

    return id;
  }

  /**
   * List tracks newest-first. Rows with equal created_at keep reverse
   * insertion order.
   */
  list(query: ListTracksQuery = {}): Track[] {
    const db = this.getDb();

    return this.query(() => {
      if (query.limit !== undefined) {
        return db.prepare(`
          SELECT * FROM tracks
          ORDER BY created_at DESC, rowid DESC
          LIMIT ?
        `).all(query.limit) as Track[];
      }
      return db.prepare(`
        SELECT * FROM tracks
        ORDER BY created_at DESC, rowid DESC
      `).all() as Track[];
    });
  }

  getById(id: string): Track {
    assertTrackId(id);
    const db = this.getDb();

    // Stored ids are lowercase; uuid.validate accepts either case
    const track = this.query(
      () => db.prepare("SELECT * FROM tracks WHERE id = ?").get(id.toLowerCase()) as Track | undefined
    );
    if (!track) {
      throw new NotFoundError("Track not found");
    }
    return track;
  }

  /**
   * Look up the track owning a stored blob, if any
   */
  findByFilename(filename: string): Track | null {
    const db = this.getDb();

    const track = this.query(
      () => db.prepare("SELECT * FROM tracks WHERE filename = ? LIMIT 1").get(filename) as Track | undefined
    );
    return track ?? null;
  }

  private query<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new PersistenceError("Failed to query tracks", { cause: error });
    }
  }
}
