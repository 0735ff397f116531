import request from "supertest";
import { afterEach, describe, it, expect, vi } from "vitest";
import { parseRange } from "../src/routes/media.js";
import { createTestContext, type TestContext } from "./helpers.js";

const AUDIO = Buffer.from("OggS-0123456789-payload");

describe("parseRange", () => {
  it("ignores absent, malformed and multi-range headers", () => {
    expect(parseRange(undefined, 100)).toBeUndefined();
    expect(parseRange("items=0-1", 100)).toBeUndefined();
    expect(parseRange("bytes=-", 100)).toBeUndefined();
    expect(parseRange("bytes=0-1,5-6", 100)).toBeUndefined();
    expect(parseRange("bytes=9-3", 100)).toBeUndefined();
  });

  it("parses bounded, open-ended and suffix ranges", () => {
    expect(parseRange("bytes=0-9", 100)).toEqual({ start: 0, end: 9 });
    expect(parseRange("bytes=90-", 100)).toEqual({ start: 90, end: 99 });
    expect(parseRange("bytes=-10", 100)).toEqual({ start: 90, end: 99 });
    expect(parseRange("bytes=50-500", 100)).toEqual({ start: 50, end: 99 });
  });

  it("flags unsatisfiable ranges", () => {
    expect(parseRange("bytes=100-", 100)).toBe("unsatisfiable");
    expect(parseRange("bytes=-0", 100)).toBe("unsatisfiable");
  });
});

describe("GET /media/:filename", () => {
  let ctx: TestContext;

  afterEach(() => {
    vi.restoreAllMocks();
    ctx.cleanup();
  });

  async function uploadAudio(): Promise<{ filename: string }> {
    const res = await request(ctx.app)
      .post("/api/tracks/upload")
      .field("title", "Streamable")
      .attach("file", AUDIO, { filename: "stream me.ogg", contentType: "audio/ogg" });
    expect(res.status).toBe(200);
    return res.body;
  }

  it("returns exactly the uploaded bytes with the stored content type", async () => {
    ctx = createTestContext();
    const { filename } = await uploadAudio();

    const res = await request(ctx.app).get(`/media/${filename}`).responseType("blob");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("audio/ogg");
    expect(res.headers["content-length"]).toBe(String(AUDIO.length));
    expect(res.headers["accept-ranges"]).toBe("bytes");
    expect(res.headers["content-disposition"]).toBe('inline; filename="stream me.ogg"');
    expect(Buffer.compare(res.body, AUDIO)).toBe(0);
  });

  it("serves files whose original name has non-latin1 characters", async () => {
    ctx = createTestContext();
    const created = await request(ctx.app)
      .post("/api/tracks/upload")
      .field("title", "Wide")
      .attach("file", AUDIO, { filename: "Café 曲.ogg", contentType: "audio/ogg" });
    expect(created.status).toBe(200);

    const res = await request(ctx.app).get(`/media/${created.body.filename}`).responseType("blob");

    expect(res.status).toBe(200);
    expect(res.headers["content-disposition"]).toContain("filename*=UTF-8''Caf%C3%A9%20%E6%9B%B2.ogg");
    expect(Buffer.compare(res.body, AUDIO)).toBe(0);
  });

  it("ignores a range that ends before it starts", async () => {
    ctx = createTestContext();
    const { filename } = await uploadAudio();

    const res = await request(ctx.app)
      .get(`/media/${filename}`)
      .set("Range", "bytes=9-3")
      .responseType("blob");

    expect(res.status).toBe(200);
    expect(res.headers["content-range"]).toBeUndefined();
    expect(Buffer.compare(res.body, AUDIO)).toBe(0);
  });

  it("serves a byte range", async () => {
    ctx = createTestContext();
    const { filename } = await uploadAudio();

    const res = await request(ctx.app)
      .get(`/media/${filename}`)
      .set("Range", "bytes=5-9")
      .responseType("blob");

    expect(res.status).toBe(206);
    expect(res.headers["content-range"]).toBe(`bytes 5-9/${AUDIO.length}`);
    expect(res.body.toString()).toBe("01234");
  });

  it("answers 416 for an unsatisfiable range", async () => {
    ctx = createTestContext();
    const { filename } = await uploadAudio();

    const res = await request(ctx.app).get(`/media/${filename}`).set("Range", "bytes=1000-");

    expect(res.status).toBe(416);
    expect(res.headers["content-range"]).toBe(`bytes */${AUDIO.length}`);
  });

  it("falls back to a generic content type for blobs without a record", async () => {
    ctx = createTestContext();
    await ctx.blobs.write("orphan.mp3", Buffer.from("abc"));

    const res = await request(ctx.app).get("/media/orphan.mp3").responseType("blob");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("application/octet-stream");
    expect(res.headers["content-disposition"]).toBeUndefined();
    expect(res.body.toString()).toBe("abc");
  });

  it("returns 404 for a missing file", async () => {
    ctx = createTestContext();
    const res = await request(ctx.app).get("/media/0123456789abcdef0123456789abcdef.mp3");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: "File not found" });
  });

  it("returns 404 for names that would leave the upload directory", async () => {
    ctx = createTestContext();
    const res = await request(ctx.app).get("/media/..%2Fsecret.txt");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: "File not found" });
  });
});

describe("GET /health", () => {
  let ctx: TestContext;

  afterEach(() => {
    vi.restoreAllMocks();
    ctx.cleanup();
  });

  it("reports the schema version when the database is available", async () => {
    ctx = createTestContext();
    const res = await request(ctx.app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: "ok",
      database: { available: true, schemaVersion: 1 },
    });
  });

  it("answers 503 when the database is unavailable", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    ctx = createTestContext({ initializeDatabase: false });
    const res = await request(ctx.app).get("/health");

    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({
      status: "degraded",
      database: { available: false, schemaVersion: null },
    });
  });
});
