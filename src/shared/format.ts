export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Parses a decimal integer the way a route segment carries it. Returns null for
 * anything that is not a plain optionally-signed run of digits.
 */
export function parseInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }

  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function parseUnsignedInteger(value: string): number | null {
  const parsed = parseInteger(value);
  if (parsed == null || parsed < 0 || value.trim().startsWith("-")) {
    return null;
  }
  return parsed;
}

export function encodeBase64(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("base64");
}
