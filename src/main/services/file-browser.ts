import path from "node:path";
import { promises as fs } from "node:fs";
import { DirectoryNotFoundError } from "../../shared/errors.js";
import type { DirectoryListing, TrackDocument } from "../../shared/types.js";
import type { MetadataService } from "./metadata-service.js";
import { isAudioFile, isHiddenEntry, resolveUnderRoot } from "./path-utils.js";
import { toTrackDocument } from "./track-documents.js";

export class FileBrowserService {
  private readonly metadataService: MetadataService;

  public constructor(metadataService: MetadataService) {
    this.metadataService = metadataService;
  }

  /**
   * Lists sub-directories and audio files of `requestedPath` under the root.
   * Hidden entries and non-audio files are left out; file entries carry their
   * tags and embedded picture.
   */
  public async list(rootPath: string, requestedPath: string): Promise<DirectoryListing> {
    const directoryPath = resolveUnderRoot(rootPath, requestedPath);
    if (!directoryPath) {
      throw new DirectoryNotFoundError(requestedPath);
    }

    let entries;
    try {
      entries = await fs.readdir(directoryPath, { withFileTypes: true });
    } catch {
      throw new DirectoryNotFoundError(requestedPath);
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));

    const directories: string[] = [];
    const files: TrackDocument[] = [];

    for (const entry of entries) {
      if (isHiddenEntry(entry.name)) {
        continue;
      }

      const fullPath = path.join(directoryPath, entry.name);
      const kind = await this.resolveKind(fullPath, entry);

      if (kind === "directory") {
        directories.push(entry.name);
      } else if (kind === "file" && isAudioFile(entry.name)) {
        const metadata = await this.metadataService.readMetadata(fullPath);
        files.push(toTrackDocument(entry.name, metadata, true));
      }
    }

    return {
      directory: directories,
      file: files
    };
  }

  private async resolveKind(
    fullPath: string,
    entry: { isDirectory(): boolean; isFile(): boolean; isSymbolicLink(): boolean }
  ): Promise<"directory" | "file" | "other"> {
    if (entry.isDirectory()) {
      return "directory";
    }
    if (entry.isFile()) {
      return "file";
    }
    if (!entry.isSymbolicLink()) {
      return "other";
    }

    try {
      const stat = await fs.stat(fullPath);
      if (stat.isDirectory()) {
        return "directory";
      }
      return stat.isFile() ? "file" : "other";
    } catch {
      return "other";
    }
  }
}
