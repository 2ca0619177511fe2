import type { DirectoryListing, StatusDocument, Track, TrackDocument } from "../../shared/types.js";
import type { FileBrowserService } from "./file-browser.js";
import type { PlaybackController } from "./playback-controller.js";
import { trackToDocument } from "./track-documents.js";

interface StatusCapture {
  track: Track;
  pos: number;
  length: number;
}

/**
 * Read-side projections of the controller. The lock is held only while the
 * needed values are copied out; documents are built after it is released.
 */
export class ControlSurface {
  private readonly controller: PlaybackController;
  private readonly browser: FileBrowserService;
  private readonly getRootPath: () => string;

  public constructor(controller: PlaybackController, browser: FileBrowserService, getRootPath: () => string) {
    this.controller = controller;
    this.browser = browser;
    this.getRootPath = getRootPath;
  }

  public async status(includePicture: boolean): Promise<StatusDocument> {
    const capture = await this.controller.read((view): StatusCapture | null => {
      const track = view.tracks[view.currentIndex];
      if (view.currentIndex === -1 || !track) {
        return null;
      }

      return {
        track,
        pos: view.decoder?.getPosition() ?? 0,
        length: view.decoder?.getLength() ?? 0
      };
    });

    if (!capture) {
      return { file: null };
    }

    return {
      ...trackToDocument(capture.track, includePicture),
      pos: capture.pos,
      length: capture.length
    };
  }

  public async playlist(): Promise<TrackDocument[]> {
    const tracks = await this.controller.read((view) => [...view.tracks]);
    return tracks.map((track) => trackToDocument(track, false));
  }

  public list(requestedPath: string): Promise<DirectoryListing> {
    return this.browser.list(this.getRootPath(), requestedPath);
  }
}
