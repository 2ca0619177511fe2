import { DEFAULT_FILES_CONFIG, DEFAULT_HTTPD_CONFIG } from "../../shared/constants.js";
import { clamp } from "../../shared/format.js";
import type { FilesConfig, HttpdConfig } from "../../shared/types.js";

function asFiniteNumber(value: unknown, fallback: number): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  return fallback;
}

function asNonEmptyString(value: unknown, fallback: string): string {
  if (typeof value === "string" && value.trim().length > 0) {
    return value.trim();
  }

  return fallback;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function sanitizeFilesConfig(candidate: unknown): FilesConfig {
  const source = isJsonObject(candidate) ? candidate : {};

  return {
    path: asNonEmptyString(source.path, DEFAULT_FILES_CONFIG.path)
  };
}

export function sanitizeHttpdConfig(candidate: unknown): HttpdConfig {
  const source = isJsonObject(candidate) ? candidate : {};
  const port = asFiniteNumber(source.port, DEFAULT_HTTPD_CONFIG.port);

  return {
    port: clamp(Math.round(port), 1, 65535),
    host: asNonEmptyString(source.host, DEFAULT_HTTPD_CONFIG.host)
  };
}
