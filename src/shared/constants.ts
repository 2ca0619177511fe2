// Matched as a case-sensitive suffix of the file name.
export const SUPPORTED_AUDIO_EXTENSIONS = [
  ".mp3",
  ".m4a",
  ".mp4",
  ".aac",
  ".ogg",
  ".wav"
] as const;

export const APP_NAME = "AirCat";

export const APP_VERSION = "1.0.0";

export const DEFAULT_CONFIG_PATH = "/etc/aircat/aircat.conf";

export const DEFAULT_FILES_CONFIG = {
  path: "/var/aircat/files"
} as const;

export const DEFAULT_HTTPD_CONFIG = {
  port: 8080,
  host: "0.0.0.0"
} as const;

export const SCHEDULER_INTERVAL_MS = 100;

export const OUTPUT_FORMAT = {
  sampleRateHz: 44100,
  channels: 2
} as const;
