import path from "node:path";
import {
  BadIndexError,
  IndexOutOfRangeError,
  PlaybackOpenFailedError,
  SeekFailedError,
  errorMessage
} from "../../shared/errors.js";
import type { PlaybackState, Track } from "../../shared/types.js";
import { createLogger, type Logger } from "../logger.js";
import { ExclusiveLock } from "./exclusive-lock.js";
import { PlaylistManager } from "./playlist-manager.js";
import type { Decoder } from "./playback/backend.js";
import type { PlaybackSession } from "./playback/session.js";

export interface TrackSource {
  loadTrack(rootPath: string, requestedPath: string): Promise<Track>;
}

export interface PlaybackView {
  tracks: readonly Track[];
  currentIndex: number;
  state: PlaybackState;
  decoder: Pick<Decoder, "getPosition" | "getLength" | "getStatus"> | null;
}

export interface PlaybackControllerOptions {
  session: PlaybackSession;
  tracks: TrackSource;
  getRootPath(): string;
}

type StepDirection = 1 | -1;

const noop = (): void => undefined;

function assertIndexShape(index: number): void {
  if (!Number.isSafeInteger(index)) {
    throw new BadIndexError(index);
  }
}

/**
 * Single point of mutation for the playlist and the playback session. Every
 * public operation takes the lock on entry; the `...Locked` helpers assume it
 * is already held.
 */
export class PlaybackController {
  private readonly playlist = new PlaylistManager();
  private readonly session: PlaybackSession;
  private readonly tracks: TrackSource;
  private readonly getRootPath: () => string;
  private readonly lock = new ExclusiveLock();
  private readonly log: Logger;
  private closed = false;

  public constructor(options: PlaybackControllerOptions) {
    this.session = options.session;
    this.tracks = options.tracks;
    this.getRootPath = options.getRootPath;
    this.log = createLogger({ component: "controller" });
  }

  public add(requestedPath: string): Promise<number> {
    return this.runOpen(() => this.playlist.length, async () => {
      const track = await this.tracks.loadTrack(this.getRootPath(), requestedPath);
      const index = this.playlist.append(track);
      this.log.info({ index, path: track.path }, "Added track to playlist");
      return index;
    });
  }

  public remove(index: number): Promise<void> {
    return this.runOpen(noop, async () => {
      assertIndexShape(index);
      if (!this.playlist.isValidIndex(index)) {
        throw new IndexOutOfRangeError(index, this.playlist.length);
      }

      if (index === this.playlist.getCurrentIndex()) {
        await this.stopLocked();
      }

      const removed = this.playlist.removeAt(index);
      this.log.info({ index, path: removed.path }, "Removed track from playlist");
    });
  }

  public flush(): Promise<void> {
    return this.runOpen(noop, async () => {
      await this.stopLocked();
      this.playlist.clear();
      this.log.info("Flushed playlist");
    });
  }

  /**
   * Starts the track at `index`; -1 restarts the current selection, or the
   * first track when nothing is selected.
   */
  public play(index = -1): Promise<void> {
    return this.runOpen(noop, async () => {
      assertIndexShape(index);
      const current = this.playlist.getCurrentIndex();
      const resolved = index === -1 ? Math.max(current, 0) : index;
      if (!this.playlist.isValidIndex(resolved)) {
        throw new IndexOutOfRangeError(resolved, this.playlist.length);
      }

      await this.stopLocked();

      const track = this.requireTrack(resolved);
      this.playlist.setCurrentIndex(resolved);
      try {
        await this.session.open(track.path);
      } catch (error) {
        this.playlist.setCurrentIndex(-1);
        this.log.warn({ index: resolved, path: track.path, error: errorMessage(error) }, "Cannot play track");
        throw error;
      }

      this.log.info({ index: resolved, file: path.basename(track.path) }, "Playing");
    });
  }

  public pause(): Promise<PlaybackState> {
    return this.runOpen(
      () => this.session.getState(),
      () => this.session.togglePause()
    );
  }

  public stop(): Promise<void> {
    return this.runOpen(noop, () => this.stopLocked());
  }

  public seek(positionSec: number): Promise<void> {
    return this.runOpen(noop, async () => {
      const active = this.session.getActive();
      if (!active) {
        throw new SeekFailedError("No track is playing.");
      }

      try {
        await active.decoder.seek(positionSec);
      } catch (error) {
        if (error instanceof SeekFailedError) {
          throw error;
        }
        throw new SeekFailedError(errorMessage(error), { position: positionSec });
      }
    });
  }

  public next(): Promise<void> {
    return this.runOpen(noop, async () => {
      if (this.playlist.getCurrentIndex() === -1) {
        return;
      }

      await this.stepLocked(1);
      // User skips drop the previous pair right away; only advance() lets it drain.
      await this.session.releaseDraining();
    });
  }

  public prev(): Promise<void> {
    return this.runOpen(noop, async () => {
      if (this.playlist.getCurrentIndex() === -1) {
        return;
      }

      await this.stepLocked(-1);
      await this.session.releaseDraining();
    });
  }

  /**
   * Scheduler transition: like next(), but the replaced pair stays draining
   * until the following transition.
   */
  public advance(): Promise<void> {
    return this.runOpen(noop, async () => {
      if (this.playlist.getCurrentIndex() === -1) {
        return;
      }
      await this.stepLocked(1);
    });
  }

  /**
   * Check-and-act for the scheduler, atomic with respect to every other
   * operation. Returns true when a transition happened.
   */
  public advanceIfFinished(): Promise<boolean> {
    return this.runOpen(() => false, async () => {
      const active = this.session.getActive();
      if (this.playlist.getCurrentIndex() === -1 || !active) {
        return false;
      }

      const { decoder } = active;
      const length = decoder.getLength();
      const reachedEnd = length > 0 && decoder.getPosition() >= length - 1;
      if (!reachedEnd && decoder.getStatus() !== "eof") {
        return false;
      }

      this.log.debug({ index: this.playlist.getCurrentIndex() }, "Track finished, advancing");
      await this.stepLocked(1);
      return true;
    });
  }

  public read<T>(project: (view: PlaybackView) => T): Promise<T> {
    return this.lock.runExclusive(() => {
      const active = this.session.getActive();
      return project({
        tracks: this.playlist.getItems(),
        currentIndex: this.playlist.getCurrentIndex(),
        state: this.session.getState(),
        decoder: active ? active.decoder : null
      });
    });
  }

  /**
   * Stops playback and empties the playlist. Used when the owning module
   * closes; operations still queued on the lock become no-ops.
   */
  public async shutdown(): Promise<void> {
    this.closed = true;
    await this.lock.runExclusive(async () => {
      await this.stopLocked();
      this.playlist.clear();
    });
  }

  private runOpen<T>(ifClosed: () => T, operation: () => Promise<T> | T): Promise<T> {
    return this.lock.runExclusive(() => (this.closed ? ifClosed() : operation()));
  }

  private async stopLocked(): Promise<void> {
    await this.session.releaseAll();
    this.playlist.setCurrentIndex(-1);
  }

  /**
   * Demotes the active pair and walks from the current index in `direction`
   * until a track opens or the playlist bound is reached.
   */
  private async stepLocked(direction: StepDirection): Promise<void> {
    await this.session.demoteActive();

    let index = this.playlist.getCurrentIndex();
    for (;;) {
      index += direction;
      if (index < 0 || index >= this.playlist.length) {
        this.playlist.setCurrentIndex(-1);
        this.log.info("Reached the end of the playlist");
        return;
      }

      const track = this.requireTrack(index);
      this.playlist.setCurrentIndex(index);
      try {
        await this.session.open(track.path);
        this.log.info({ index, file: path.basename(track.path) }, "Playing");
        return;
      } catch (error) {
        if (!(error instanceof PlaybackOpenFailedError)) {
          throw error;
        }
        this.log.warn({ index, path: track.path, error: error.message }, "Skipping unplayable track");
      }
    }
  }

  private requireTrack(index: number): Track {
    const track = this.playlist.getItem(index);
    if (!track) {
      throw new IndexOutOfRangeError(index, this.playlist.length);
    }
    return track;
  }
}
