// Sales Call Scorecard - Audio Storage
// Locates and reads the recorded call for a session. Storage mechanics stay
// behind this interface; the pipeline only sees AudioArtifact locators.

import { mkdir, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { extname, join, resolve } from "node:path";
import { ValidationError } from "./errors.js";
import type { AudioArtifact } from "./types.js";

export interface AudioStorage {
  /** The stored artifact for a session, or null when nothing was uploaded. */
  describe(sessionId: string): Promise<AudioArtifact | null>;
  read(locator: string): Promise<Buffer>;
  save(sessionId: string, data: Buffer, mimeType: string): Promise<AudioArtifact>;
}

/** File extension for each accepted upload type. */
export const AUDIO_EXTENSIONS: Readonly<Record<string, string>> = {
  "audio/wav": ".wav",
  "audio/x-wav": ".wav",
  "audio/mpeg": ".mp3",
  "audio/mp4": ".m4a",
  "audio/x-m4a": ".m4a",
  "audio/webm": ".webm",
  "audio/ogg": ".ogg",
  "audio/flac": ".flac",
};

const MIME_BY_EXTENSION: Readonly<Record<string, string>> = {
  ".wav": "audio/wav",
  ".mp3": "audio/mpeg",
  ".m4a": "audio/mp4",
  ".webm": "audio/webm",
  ".ogg": "audio/ogg",
  ".flac": "audio/flac",
};

export function isSupportedAudioType(mimeType: string): boolean {
  return Object.hasOwn(AUDIO_EXTENSIONS, mimeType);
}

/**
 * Stores one file per session as `<dir>/<sessionId><ext>`. The locator is
 * the absolute file path. Saving again replaces the session's recording,
 * whatever its previous extension.
 */
export class LocalAudioStorage implements AudioStorage {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  async describe(sessionId: string): Promise<AudioArtifact | null> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }

    const name = entries.find((e) => isSessionFile(e, sessionId));
    if (!name) return null;

    const locator = join(this.dir, name);
    const info = await stat(locator);
    return {
      locator,
      mimeType: MIME_BY_EXTENSION[extname(name)] ?? "application/octet-stream",
      durationSeconds: null,
      sizeBytes: info.size,
      attachedAt: info.mtime,
    };
  }

  read(locator: string): Promise<Buffer> {
    return readFile(locator);
  }

  async save(sessionId: string, data: Buffer, mimeType: string): Promise<AudioArtifact> {
    const ext = AUDIO_EXTENSIONS[mimeType];
    if (!ext) {
      throw new ValidationError(`Unsupported audio type "${mimeType}"`);
    }
    if (data.length === 0) {
      throw new ValidationError("Audio upload is empty");
    }
    await mkdir(this.dir, { recursive: true });
    const fileName = `${sessionId}${ext}`;
    const locator = join(this.dir, fileName);
    await writeFile(locator, data);

    // A recording saved under another extension would shadow this one in describe().
    const stale = (await readdir(this.dir)).filter((e) => e !== fileName && isSessionFile(e, sessionId));
    await Promise.all(stale.map((e) => rm(join(this.dir, e), { force: true })));
    return {
      locator,
      mimeType: MIME_BY_EXTENSION[ext] ?? mimeType,
      durationSeconds: null,
      sizeBytes: data.length,
      attachedAt: new Date(),
    };
  }
}

function isSessionFile(name: string, sessionId: string): boolean {
  return name.slice(0, name.length - extname(name).length) === sessionId;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
