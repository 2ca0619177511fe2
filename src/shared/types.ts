export type PlaybackState = "stopped" | "playing" | "paused";

export interface FilesConfig {
  path: string;
}

export interface HttpdConfig {
  port: number;
  host: string;
}

export interface TrackPicture {
  data: Uint8Array;
  mime: string | null;
}

export interface TrackMetadata {
  title: string | null;
  artist: string | null;
  album: string | null;
  comment: string | null;
  genre: string | null;
  trackNumber: number;
  year: number;
  picture: TrackPicture | null;
}

export interface Track {
  readonly path: string;
  readonly metadata: TrackMetadata | null;
}

export interface TrackDocument {
  file: string;
  title?: string | null;
  artist?: string | null;
  album?: string | null;
  comment?: string | null;
  genre?: string | null;
  track?: number;
  year?: number;
  picture?: string;
  mime?: string | null;
}

export interface PlayingTrackDocument extends TrackDocument {
  pos: number;
  length: number;
}

export type StatusDocument = { file: null } | PlayingTrackDocument;

export interface DirectoryListing {
  directory: string[];
  file: TrackDocument[];
}
