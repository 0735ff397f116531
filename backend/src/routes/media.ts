/**
 * Media Routes
 *
 * GET /media/:filename - Stream a stored audio file, with single-range
 * support for seeking.
 */

import { Router, Request, Response } from "express";
import contentDisposition from "content-disposition";
import { asyncHandler } from "../middleware/index.js";
import { MEDIA_ROUTE_PREFIX } from "../constants.js";
import type { TrackService } from "../services/track-service.js";
import type { BlobStorage, ByteRange } from "../types/index.js";

/**
 * Parse a `Range: bytes=...` header against a file size.
 * Returns undefined when the header should be ignored (absent, malformed,
 * multi-range or ending before it starts) and "unsatisfiable" when it cannot
 * be served.
 */
export function parseRange(header: string | undefined, fileSize: number): ByteRange | "unsatisfiable" | undefined {
  if (!header) {
    return undefined;
  }
  const match = /^bytes=(\d*)-(\d*)$/.exec(header.trim());
  if (!match || (match[1] === "" && match[2] === "")) {
    return undefined;
  }

  let start: number;
  let end: number;
  if (match[1] === "") {
    // Suffix range: last N bytes
    const suffix = parseInt(match[2], 10);
    if (suffix === 0) {
      return "unsatisfiable";
    }
    start = Math.max(fileSize - suffix, 0);
    end = fileSize - 1;
  } else {
    start = parseInt(match[1], 10);
    if (match[2] !== "" && parseInt(match[2], 10) < start) {
      return undefined;
    }
    end = match[2] === "" ? fileSize - 1 : Math.min(parseInt(match[2], 10), fileSize - 1);
  }

  if (start >= fileSize) {
    return "unsatisfiable";
  }
  return { start, end };
}

export function createMediaRoutes(tracks: TrackService, blobs: BlobStorage): Router {
  const router = Router();

  router.get(
    `${MEDIA_ROUTE_PREFIX}/:filename`,
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { filename } = req.params;

      // NotFoundError if the blob is missing or the name is unsafe
      const { size: fileSize } = await blobs.stat(filename);
      const { contentType, originalFilename } = tracks.describeMedia(filename);

      res.setHeader("Content-Type", contentType);
      res.setHeader("Accept-Ranges", "bytes");
      if (originalFilename) {
        res.setHeader("Content-Disposition", contentDisposition(originalFilename, { type: "inline" }));
      }

      const range = parseRange(req.headers.range, fileSize);
      if (range === "unsatisfiable") {
        res.status(416);
        res.setHeader("Content-Range", `bytes */${fileSize}`);
        res.end();
        return;
      }

      if (range) {
        res.status(206);
        res.setHeader("Content-Range", `bytes ${range.start}-${range.end}/${fileSize}`);
        res.setHeader("Content-Length", range.end - range.start + 1);
      } else {
        res.setHeader("Content-Length", fileSize);
      }

      const fileStream = await blobs.createReadStream(filename, range);
      fileStream.on("error", (error) => {
        console.error("Media stream error:", error);
        res.destroy(error);
      });
      fileStream.pipe(res);
    })
  );

  return router;
}
