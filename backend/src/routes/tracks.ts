/**
 * Track API Routes
 *
 * - POST /api/tracks/upload - Upload an audio file with metadata
 * - GET  /api/tracks        - List tracks, newest first
 * - GET  /api/tracks/:id    - Get one track
 */

import { Router, Request, Response } from "express";
import multer from "multer";
import { asyncHandler } from "../middleware/index.js";
import { InvalidContentTypeError, ValidationError } from "../errors.js";
import { decodeUploadName } from "../services/filename.js";
import type { TrackService } from "../services/track-service.js";
import {
  assertAudioContentType,
  isAudioContentType,
  parseLimit,
  validateUploadFields,
} from "../services/validation.js";

export interface TrackRoutesOptions {
  maxUploadBytes: number;
}

export function createTrackRoutes(tracks: TrackService, options: TrackRoutesOptions): Router {
  const router = Router();

  // Non-audio parts are rejected before their bytes are buffered
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: options.maxUploadBytes,
      files: 1,
    },
    fileFilter: (_req, file, cb) => {
      if (!isAudioContentType(file.mimetype)) {
        cb(new InvalidContentTypeError());
        return;
      }
      cb(null, true);
    },
  });

  /**
   * POST /api/tracks/upload
   *
   * Form fields:
   *   - file: The audio file (required, audio/* content type)
   *   - title: Track title (required)
   *   - artist, album, genre, cover_url: optional
   *
   * Example:
   *   curl -X POST -F "file=@song.mp3;type=audio/mpeg" -F "title=Song" http://localhost:8000/api/tracks/upload
   */
  router.post(
    "/api/tracks/upload",
    upload.single("file"),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      if (!req.file) {
        throw new ValidationError("No file uploaded");
      }

      assertAudioContentType(req.file.mimetype);
      const fields = validateUploadFields(req.body ?? {});

      const track = await tracks.upload({
        ...fields,
        content: req.file.buffer,
        contentType: req.file.mimetype,
        originalFilename: decodeUploadName(req.file.originalname),
      });

      res.json(track);
    })
  );

  /**
   * GET /api/tracks
   *
   * Query parameters:
   *   - limit: Max number of results (optional, 0 or absent means no limit)
   */
  router.get("/api/tracks", (req: Request, res: Response): void => {
    const limit = parseLimit(req.query.limit);
    res.json(tracks.list({ limit }));
  });

  router.get("/api/tracks/:id", (req: Request, res: Response): void => {
    res.json(tracks.getById(req.params.id));
  });

  return router;
}
