import { promises as fs } from "node:fs";
import { parseFile, type IAudioMetadata } from "music-metadata";
import { InvalidFileError, errorMessage } from "../../shared/errors.js";
import type { Track, TrackMetadata, TrackPicture } from "../../shared/types.js";
import { createLogger, type Logger } from "../logger.js";
import { resolveUnderRoot } from "./path-utils.js";

export type TagParser = (filePath: string) => Promise<IAudioMetadata>;

const parseWithCovers: TagParser = (filePath) => parseFile(filePath, {
  skipCovers: false,
  duration: false
});

function parseString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function parseCount(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return 0;
  }

  return Math.floor(value);
}

function joinStrings(values: unknown[] | undefined): string | null {
  if (!values) {
    return null;
  }

  const flattened = values
    .map((entry) => {
      if (typeof entry === "string") {
        return entry;
      }
      // Newer parser releases wrap comments as { text, language, descriptor }.
      if (entry && typeof entry === "object" && "text" in entry) {
        return parseString(entry.text);
      }
      return null;
    })
    .filter((entry): entry is string => Boolean(entry && entry.trim().length > 0));

  return flattened.length > 0 ? flattened.join(", ") : null;
}

function pickPicture(parsed: IAudioMetadata): TrackPicture | null {
  const picture = parsed.common.picture?.[0];
  if (!picture || picture.data.byteLength === 0) {
    return null;
  }

  return {
    data: picture.data,
    mime: parseString(picture.format)
  };
}

export function toTrackMetadata(parsed: IAudioMetadata): TrackMetadata {
  const comments: unknown[] | undefined = parsed.common.comment;
  const genres: unknown[] | undefined = parsed.common.genre;

  return {
    title: parseString(parsed.common.title),
    artist: parseString(parsed.common.artist),
    album: parseString(parsed.common.album),
    comment: joinStrings(comments),
    genre: joinStrings(genres),
    trackNumber: parseCount(parsed.common.track.no),
    year: parseCount(parsed.common.year),
    picture: pickPicture(parsed)
  };
}

/**
 * Turns request paths into playlist tracks: resolves them under the root
 * directory, checks the file opens, and reads tags once.
 */
export class MetadataService {
  private readonly parseTags: TagParser;
  private readonly log: Logger;

  public constructor(parseTags: TagParser = parseWithCovers) {
    this.parseTags = parseTags;
    this.log = createLogger({ component: "metadata" });
  }

  public async loadTrack(rootPath: string, requestedPath: string): Promise<Track> {
    if (requestedPath.trim().length === 0) {
      throw new InvalidFileError("Path is required.");
    }
    if (requestedPath.includes("\0")) {
      throw new InvalidFileError("Path contains invalid characters.", { path: requestedPath });
    }

    const resolved = resolveUnderRoot(rootPath, requestedPath);
    if (!resolved) {
      throw new InvalidFileError("Path escapes the files directory.", { path: requestedPath });
    }

    try {
      const handle = await fs.open(resolved, "r");
      try {
        const stat = await handle.stat();
        if (!stat.isFile()) {
          throw new InvalidFileError("Path is not a regular file.", { path: resolved });
        }
      } finally {
        await handle.close();
      }
    } catch (error) {
      if (error instanceof InvalidFileError) {
        throw error;
      }
      throw new InvalidFileError("Cannot open file.", { path: resolved });
    }

    return {
      path: resolved,
      metadata: await this.readMetadata(resolved)
    };
  }

  public async readMetadata(filePath: string): Promise<TrackMetadata | null> {
    try {
      return toTrackMetadata(await this.parseTags(filePath));
    } catch (error) {
      this.log.debug({ path: filePath, error: errorMessage(error) }, "No readable tags");
      return null;
    }
  }
}
