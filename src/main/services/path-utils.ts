import path from "node:path";
import { SUPPORTED_AUDIO_EXTENSIONS } from "../../shared/constants.js";

export function isAudioFile(fileName: string): boolean {
  return SUPPORTED_AUDIO_EXTENSIONS.some((extension) => fileName.endsWith(extension));
}

export function isHiddenEntry(name: string): boolean {
  return name.startsWith(".");
}

export function normalizePath(filePath: string): string {
  return path.resolve(filePath);
}

/**
 * Joins a request path onto the root directory. Returns null when the result
 * would land outside the root.
 */
export function resolveUnderRoot(rootPath: string, requestedPath: string): string | null {
  const normalizedRoot = normalizePath(rootPath);
  const resolved = path.resolve(normalizedRoot, `.${path.sep}${requestedPath}`);

  const relative = path.relative(normalizedRoot, resolved);
  if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }

  return resolved;
}
