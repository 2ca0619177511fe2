import { spawn, type ChildProcessByStdio } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { OUTPUT_FORMAT } from "../../../shared/constants.js";
import { ResourceExhaustedError } from "../../../shared/errors.js";
import { clamp } from "../../../shared/format.js";
import { createLogger, type Logger } from "../../logger.js";
import type { ManagedOutputSink, OutputStream, PcmFormat, PcmSource } from "./backend.js";

const CHUNK_MS = 20;
const BYTES_PER_SAMPLE = 2;
const DEFAULT_MAX_STREAMS = 8;

interface MixerStream extends OutputStream {
  source: PcmSource;
  playing: boolean;
}

export interface PcmOutputOptions {
  /** Player fed with the mixed PCM; null mixes without playing anything. */
  command?: string | null;
  args?: string[];
  format?: PcmFormat;
  maxStreams?: number;
}

function sameFormat(a: PcmFormat, b: PcmFormat): boolean {
  return a.sampleRateHz === b.sampleRateHz && a.channels === b.channels;
}

function defaultPlayerArgs(format: PcmFormat): string[] {
  return [
    "-q",
    "-t",
    "raw",
    "-f",
    "S16_LE",
    "-r",
    String(format.sampleRateHz),
    "-c",
    String(format.channels),
    "-"
  ];
}

/**
 * Software mixer in front of an ALSA player process. Every CHUNK_MS it pulls
 * one chunk from each playing stream, sums them with clipping and writes the
 * result to the player's stdin. Streams keep being pulled without a player so
 * decoder positions still move.
 */
export class PcmOutput implements ManagedOutputSink {
  public readonly format: PcmFormat;
  private readonly command: string | null;
  private readonly args: string[];
  private readonly chunkBytes: number;
  private readonly maxStreams: number;
  private readonly streams = new Map<number, MixerStream>();
  private readonly log: Logger;
  private nextStreamId = 1;
  private timer: NodeJS.Timeout | null = null;
  private player: ChildProcessByStdio<Writable, null, Readable> | null = null;
  private awaitingDrain = false;
  private shuttingDown = false;

  public constructor(options: PcmOutputOptions = {}) {
    this.format = options.format ?? { ...OUTPUT_FORMAT };
    this.command = options.command === undefined ? "aplay" : options.command;
    this.args = options.args ?? defaultPlayerArgs(this.format);
    this.maxStreams = options.maxStreams ?? DEFAULT_MAX_STREAMS;
    const frameBytes = this.format.channels * BYTES_PER_SAMPLE;
    this.chunkBytes = Math.round((this.format.sampleRateHz * CHUNK_MS) / 1000) * frameBytes;
    this.log = createLogger({ component: "output" });
  }

  public start(): void {
    this.shuttingDown = false;
    if (this.command !== null) {
      this.spawnPlayer(this.command);
    }

    this.timer = setInterval(() => {
      this.tick();
    }, CHUNK_MS);
  }

  public async stop(): Promise<void> {
    this.shuttingDown = true;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    this.streams.clear();

    const player = this.player;
    this.player = null;
    if (!player) {
      return;
    }

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        player.kill("SIGKILL");
        resolve();
      }, 1000);

      player.once("close", () => {
        clearTimeout(timeout);
        resolve();
      });

      player.stdin.end();
      player.kill("SIGTERM");
    });
  }

  public addStream(format: PcmFormat, source: PcmSource): OutputStream {
    if (!sameFormat(format, this.format)) {
      throw new Error(
        `Stream format ${format.sampleRateHz}Hz/${format.channels}ch does not match output ${this.format.sampleRateHz}Hz/${this.format.channels}ch`
      );
    }
    if (this.streams.size >= this.maxStreams) {
      throw new ResourceExhaustedError("No free output stream.", { maxStreams: this.maxStreams });
    }

    const stream: MixerStream = {
      id: this.nextStreamId,
      format,
      source,
      playing: false
    };
    this.nextStreamId += 1;
    this.streams.set(stream.id, stream);
    return stream;
  }

  public playStream(stream: OutputStream): void {
    const target = this.streams.get(stream.id);
    if (target) {
      target.playing = true;
    }
  }

  public pauseStream(stream: OutputStream): void {
    const target = this.streams.get(stream.id);
    if (target) {
      target.playing = false;
    }
  }

  public removeStream(stream: OutputStream): void {
    this.streams.delete(stream.id);
  }

  public getStreamCount(): number {
    return this.streams.size;
  }

  /**
   * Pulls one chunk from every playing stream and sums them, clipped to 16 bits.
   * Returns null when no playing stream produced any samples.
   */
  public mixChunk(): Buffer | null {
    const sampleCount = this.chunkBytes / BYTES_PER_SAMPLE;
    const accumulator = new Int32Array(sampleCount);
    let mixedAny = false;

    for (const stream of this.streams.values()) {
      if (!stream.playing) {
        continue;
      }

      const chunk = stream.source(this.chunkBytes);
      const samples = Math.min(Math.floor(chunk.length / BYTES_PER_SAMPLE), sampleCount);
      for (let i = 0; i < samples; i += 1) {
        accumulator[i] = (accumulator[i] ?? 0) + chunk.readInt16LE(i * BYTES_PER_SAMPLE);
      }
      mixedAny = mixedAny || samples > 0;
    }

    if (!mixedAny) {
      return null;
    }

    const output = Buffer.alloc(this.chunkBytes);
    for (let i = 0; i < sampleCount; i += 1) {
      const value = accumulator[i] ?? 0;
      output.writeInt16LE(clamp(value, -32768, 32767), i * BYTES_PER_SAMPLE);
    }
    return output;
  }

  private spawnPlayer(command: string): void {
    const player = spawn(command, this.args, { stdio: ["pipe", "ignore", "pipe"] });
    this.player = player;
    this.awaitingDrain = false;

    player.on("error", (error) => {
      this.log.warn({ command, error: error.message }, "Audio player unavailable, output is muted");
      this.detachPlayer(player);
    });

    player.stderr.setEncoding("utf8");
    player.stderr.on("data", (chunk: string) => {
      this.log.debug({ command, output: chunk.trim() }, "Audio player output");
    });

    player.stdin.on("error", (error) => {
      this.log.debug({ error: error.message }, "Audio player input closed");
      this.detachPlayer(player);
      player.kill("SIGTERM");
    });

    player.stdin.on("drain", () => {
      this.awaitingDrain = false;
    });

    player.on("exit", (code, signal) => {
      this.detachPlayer(player);
      if (!this.shuttingDown) {
        this.log.warn(
          { code: code ?? "n/a", signal: signal ?? "n/a" },
          "Audio player exited unexpectedly, output is muted"
        );
      }
    });
  }

  // A player that went away can no longer drain; streams are pulled muted from then on.
  private detachPlayer(player: ChildProcessByStdio<Writable, null, Readable>): void {
    if (this.player === player) {
      this.player = null;
      this.awaitingDrain = false;
    }
  }

  private tick(): void {
    const player = this.player;
    if (player && this.awaitingDrain) {
      return;
    }

    const output = this.mixChunk();
    if (!player || !output) {
      return;
    }

    if (!player.stdin.write(output)) {
      this.awaitingDrain = true;
    }
  }
}
