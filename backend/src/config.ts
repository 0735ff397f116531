/**
 * Runtime configuration
 *
 * The only place that reads process.env. Components receive the resulting
 * AppConfig (or the part of it they need) through their constructors.
 */

import path from "path";
import { z } from "zod";
import { API_CONFIG, MAX_FILE_SIZE_BYTES } from "./constants.js";

export interface AppConfig {
  port: number;
  host: string;
  /** Absolute public origin for media links, without trailing slash */
  publicBaseUrl?: string;
  uploadDir: string;
  databasePath: string;
  maxUploadBytes: number;
}

// Blank variables count as unset
const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalText = z.preprocess(emptyToUndefined, z.string().trim().optional());

const positiveInt = z.preprocess(
  emptyToUndefined,
  z.string()
    .trim()
    .regex(/^[1-9]\d*$/, "must be a positive integer")
    .transform(Number)
    .optional()
);

const publicUrl = z.preprocess(
  emptyToUndefined,
  z.string()
    .trim()
    .url("must be an absolute URL")
    .refine((value) => /^https?:\/\//i.test(value), "must use http or https")
    .transform((value) => value.replace(/\/+$/, ""))
    .optional()
);

const envSchema = z.object({
  PORT: positiveInt,
  HOST: optionalText,
  PUBLIC_BACKEND_URL: publicUrl,
  UPLOAD_DIR: optionalText,
  DATABASE_PATH: optionalText,
  MAX_UPLOAD_BYTES: positiveInt,
});

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid ${issue.path.join(".")}: ${issue.message}`);
  }
  const vars = parsed.data;

  return Object.freeze({
    port: vars.PORT ?? API_CONFIG.DEFAULT_PORT,
    host: vars.HOST ?? API_CONFIG.DEFAULT_HOST,
    publicBaseUrl: vars.PUBLIC_BACKEND_URL,
    uploadDir: path.resolve(cwd, vars.UPLOAD_DIR ?? "uploads"),
    databasePath: path.resolve(cwd, vars.DATABASE_PATH ?? path.join("data", "tracks.db")),
    maxUploadBytes: vars.MAX_UPLOAD_BYTES ?? MAX_FILE_SIZE_BYTES,
  });
}
