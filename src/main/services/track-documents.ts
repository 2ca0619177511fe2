import path from "node:path";
import { encodeBase64 } from "../../shared/format.js";
import type { Track, TrackDocument, TrackMetadata } from "../../shared/types.js";

export function toTrackDocument(
  fileName: string,
  metadata: TrackMetadata | null,
  includePicture: boolean
): TrackDocument {
  const document: TrackDocument = { file: fileName };
  if (!metadata) {
    return document;
  }

  document.title = metadata.title;
  document.artist = metadata.artist;
  document.album = metadata.album;
  document.comment = metadata.comment;
  document.genre = metadata.genre;
  document.track = metadata.trackNumber;
  document.year = metadata.year;

  if (includePicture && metadata.picture && metadata.picture.data.byteLength > 0) {
    document.picture = encodeBase64(metadata.picture.data);
  }
  document.mime = metadata.picture?.mime ?? null;

  return document;
}

export function trackToDocument(track: Track, includePicture: boolean): TrackDocument {
  return toTrackDocument(path.basename(track.path), track.metadata, includePicture);
}
