import { PlaybackOpenFailedError } from "../../../shared/errors.js";
import type { PlaybackState } from "../../../shared/types.js";
import { createLogger, logError, type Logger } from "../../logger.js";
import type { Decoder, DecoderFactory, OutputSink, OutputStream } from "./backend.js";

export interface SessionPair {
  decoder: Decoder;
  stream: OutputStream;
}

/**
 * The decoder/stream pair of the current track plus the pair of the track
 * before it, which is kept only so queued audio can run out. At most one
 * draining pair exists: installing a new one releases the old one first.
 */
export class PlaybackSession {
  private readonly sink: OutputSink;
  private readonly decoders: DecoderFactory;
  private readonly log: Logger;
  private active: SessionPair | null = null;
  private draining: SessionPair | null = null;
  private state: PlaybackState = "stopped";

  public constructor(sink: OutputSink, decoders: DecoderFactory) {
    this.sink = sink;
    this.decoders = decoders;
    this.log = createLogger({ component: "session" });
  }

  public getState(): PlaybackState {
    return this.state;
  }

  public getActive(): SessionPair | null {
    return this.active;
  }

  public getDraining(): SessionPair | null {
    return this.draining;
  }

  /**
   * Opens a decoder for `filePath`, registers its stream with the sink and
   * starts it. The caller must have released or demoted the previous pair.
   */
  public async open(filePath: string): Promise<SessionPair> {
    if (this.active) {
      throw new Error("An active pair is still open; demote or release it first.");
    }

    let decoder: Decoder;
    try {
      decoder = await this.decoders.open(filePath);
    } catch (error) {
      throw new PlaybackOpenFailedError(filePath, error);
    }

    let stream: OutputStream;
    try {
      stream = this.sink.addStream(decoder.format, decoder.read);
    } catch (error) {
      await this.closeDecoder(decoder);
      throw new PlaybackOpenFailedError(filePath, error);
    }

    this.sink.playStream(stream);
    this.active = { decoder, stream };
    this.state = "playing";
    this.log.debug({ path: filePath, length: decoder.getLength() }, "Opened playback pair");
    return this.active;
  }

  public togglePause(): PlaybackState {
    if (!this.active) {
      return this.state;
    }

    if (this.state === "playing") {
      this.sink.pauseStream(this.active.stream);
      this.state = "paused";
    } else {
      this.sink.playStream(this.active.stream);
      this.state = "playing";
    }

    return this.state;
  }

  /**
   * Releases the current draining pair, then turns the active pair (if any)
   * into the new draining pair.
   */
  public async demoteActive(): Promise<void> {
    await this.releaseDraining();
    this.draining = this.active;
    this.active = null;
    this.state = "stopped";
  }

  public async releaseDraining(): Promise<void> {
    const draining = this.draining;
    this.draining = null;
    if (draining) {
      await this.release(draining);
    }
  }

  public async releaseAll(): Promise<void> {
    const active = this.active;
    this.active = null;
    this.state = "stopped";
    if (active) {
      await this.release(active);
    }
    await this.releaseDraining();
  }

  private async release(pair: SessionPair): Promise<void> {
    this.sink.removeStream(pair.stream);
    await this.closeDecoder(pair.decoder);
  }

  private async closeDecoder(decoder: Decoder): Promise<void> {
    try {
      await decoder.close();
    } catch (error) {
      logError(this.log, error, "Failed to close decoder", { path: decoder.filePath });
    }
  }
}
