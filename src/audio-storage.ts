// PitchScoop - Audio storage
// Recorded audio is kept per (event_id, session_id) on local disk:
//
//   {baseDir}/{eventId}/{sessionId}.audio   raw bytes
//   {baseDir}/{eventId}/{sessionId}.json    { content_type, size, saved_at }
//
// Playback goes through the server's /api/audio route using URLs signed with
// an HMAC over event, session and expiry.

import { createHmac, timingSafeEqual } from "node:crypto";
import { mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { ValidationError } from "./errors.js";

export interface StoredAudio {
  size: number;
  content_type: string;
  saved_at: string;
}

export interface AudioRecord extends StoredAudio {
  data: Buffer;
}

export interface PlaybackUrl {
  url: string;
  expires_at: string;
}

export interface AudioStorage {
  save(eventId: string, sessionId: string, data: Buffer, contentType: string): Promise<StoredAudio>;
  read(eventId: string, sessionId: string): Promise<AudioRecord | null>;
  delete(eventId: string, sessionId: string): Promise<boolean>;
  deleteEvent(eventId: string): Promise<void>;
  getPlaybackUrl(eventId: string, sessionId: string, expiresInSeconds: number): PlaybackUrl;
  verifyPlaybackSignature(
    eventId: string,
    sessionId: string,
    expires: string,
    signature: string,
  ): boolean;
}

export interface FileAudioStorageOptions {
  baseDir: string;
  publicBaseUrl: string;
  secret: string;
  /** Clock in milliseconds; injectable for expiry tests. */
  now?: () => number;
}

const SAFE_SEGMENT = /^[A-Za-z0-9_-]+$/;

function assertSafeSegment(kind: string, value: string): void {
  if (!SAFE_SEGMENT.test(value)) {
    throw new ValidationError(`Invalid ${kind} for audio storage: "${value}"`);
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileAudioStorage implements AudioStorage {
  private readonly baseDir: string;
  private readonly publicBaseUrl: string;
  private readonly secret: string;
  private readonly now: () => number;

  constructor(options: FileAudioStorageOptions) {
    this.baseDir = options.baseDir;
    this.publicBaseUrl = options.publicBaseUrl.replace(/\/+$/, "");
    this.secret = options.secret;
    this.now = options.now ?? Date.now;
  }

  private paths(eventId: string, sessionId: string): { dir: string; data: string; meta: string } {
    assertSafeSegment("event_id", eventId);
    assertSafeSegment("session_id", sessionId);
    const dir = join(this.baseDir, eventId);
    return {
      dir,
      data: join(dir, `${sessionId}.audio`),
      meta: join(dir, `${sessionId}.json`),
    };
  }

  async save(
    eventId: string,
    sessionId: string,
    data: Buffer,
    contentType: string,
  ): Promise<StoredAudio> {
    const paths = this.paths(eventId, sessionId);
    await mkdir(paths.dir, { recursive: true });

    const stored: StoredAudio = {
      size: data.length,
      content_type: contentType,
      saved_at: new Date(this.now()).toISOString(),
    };
    await writeFile(paths.data, data);
    await writeFile(paths.meta, JSON.stringify(stored, null, 2), "utf-8");
    return stored;
  }

  async read(eventId: string, sessionId: string): Promise<AudioRecord | null> {
    const paths = this.paths(eventId, sessionId);
    try {
      const [data, metaText] = await Promise.all([
        readFile(paths.data),
        readFile(paths.meta, "utf-8"),
      ]);
      const meta: unknown = JSON.parse(metaText);
      const contentType =
        meta !== null &&
        typeof meta === "object" &&
        "content_type" in meta &&
        typeof meta.content_type === "string"
          ? meta.content_type
          : "application/octet-stream";
      const savedAt =
        meta !== null && typeof meta === "object" && "saved_at" in meta && typeof meta.saved_at === "string"
          ? meta.saved_at
          : "";
      return { data, size: data.length, content_type: contentType, saved_at: savedAt };
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async delete(eventId: string, sessionId: string): Promise<boolean> {
    const paths = this.paths(eventId, sessionId);
    let existed = true;
    try {
      await stat(paths.data);
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      existed = false;
    }
    await rm(paths.data, { force: true });
    await rm(paths.meta, { force: true });
    return existed;
  }

  async deleteEvent(eventId: string): Promise<void> {
    assertSafeSegment("event_id", eventId);
    await rm(join(this.baseDir, eventId), { recursive: true, force: true });
  }

  getPlaybackUrl(eventId: string, sessionId: string, expiresInSeconds: number): PlaybackUrl {
    assertSafeSegment("event_id", eventId);
    assertSafeSegment("session_id", sessionId);
    const expires = Math.floor(this.now() / 1000) + expiresInSeconds;
    const signature = this.sign(eventId, sessionId, String(expires));
    const query = new URLSearchParams({ expires: String(expires), signature });
    return {
      url: `${this.publicBaseUrl}/api/audio/${eventId}/${sessionId}?${query.toString()}`,
      expires_at: new Date(expires * 1000).toISOString(),
    };
  }

  verifyPlaybackSignature(
    eventId: string,
    sessionId: string,
    expires: string,
    signature: string,
  ): boolean {
    if (!/^\d+$/.test(expires)) return false;
    if (Number(expires) * 1000 <= this.now()) return false;

    const expected = Buffer.from(this.sign(eventId, sessionId, expires), "hex");
    const given = Buffer.from(signature, "hex");
    return given.length === expected.length && timingSafeEqual(given, expected);
  }

  private sign(eventId: string, sessionId: string, expires: string): string {
    return createHmac("sha256", this.secret)
      .update(`${eventId}/${sessionId}/${expires}`)
      .digest("hex");
  }
}
