import { spawn, type ChildProcessByStdio } from "node:child_process";
import type { Readable } from "node:stream";
import { parseFile } from "music-metadata";
import { OUTPUT_FORMAT } from "../../../shared/constants.js";
import { SeekFailedError, errorMessage } from "../../../shared/errors.js";
import type { Decoder, DecoderFactory, DecoderStatus, PcmFormat } from "./backend.js";

const BYTES_PER_SAMPLE = 2;
const DECODER_START_TIMEOUT_MS = 5000;
const BUFFER_SECONDS = 2;
const STDERR_TAIL_LIMIT = 2048;

interface DecodePipeline {
  child: ChildProcessByStdio<null, Readable, Readable>;
  chunks: Buffer[];
  bufferedBytes: number;
  ended: boolean;
}

interface FfmpegDecoderOptions {
  command: string;
  format: PcmFormat;
  lengthSec: number;
}

async function probeLengthSec(filePath: string): Promise<number> {
  try {
    const parsed = await parseFile(filePath, {
      skipCovers: true,
      duration: true
    });
    const duration = parsed.format.duration;
    return duration != null && Number.isFinite(duration) && duration > 0 ? Math.floor(duration) : 0;
  } catch {
    return 0;
  }
}

function killPipeline(pipeline: DecodePipeline): void {
  pipeline.ended = true;
  pipeline.chunks = [];
  pipeline.bufferedBytes = 0;
  pipeline.child.stdout.destroy();
  pipeline.child.stderr.destroy();
  if (pipeline.child.exitCode === null) {
    pipeline.child.kill("SIGTERM");
  }
}

/**
 * Decodes one file through an ffmpeg child process into raw PCM matching the
 * output format. Decoded audio is buffered up to a couple of seconds ahead of
 * the reader; ffmpeg's stdout is paused while the buffer is full.
 */
export class FfmpegDecoder implements Decoder {
  public readonly filePath: string;
  public readonly format: PcmFormat;
  private readonly command: string;
  private readonly lengthSec: number;
  private readonly bytesPerSecond: number;
  private readonly highWaterBytes: number;
  private pipeline: DecodePipeline | null = null;
  private startOffsetSec = 0;
  private consumedBytes = 0;
  private closed = false;

  public constructor(filePath: string, options: FfmpegDecoderOptions) {
    this.filePath = filePath;
    this.format = options.format;
    this.command = options.command;
    this.lengthSec = options.lengthSec;
    this.bytesPerSecond = options.format.sampleRateHz * options.format.channels * BYTES_PER_SAMPLE;
    this.highWaterBytes = this.bytesPerSecond * BUFFER_SECONDS;
  }

  public async start(): Promise<void> {
    this.pipeline = await this.spawnPipeline(0);
  }

  public read = (maxBytes: number): Buffer => {
    const pipeline = this.pipeline;
    if (!pipeline || pipeline.bufferedBytes === 0) {
      return Buffer.alloc(0);
    }

    const frameBytes = this.format.channels * BYTES_PER_SAMPLE;
    const wanted = Math.min(maxBytes, pipeline.bufferedBytes);
    const target = wanted - (wanted % frameBytes);
    if (target === 0) {
      return Buffer.alloc(0);
    }

    const parts: Buffer[] = [];
    let collected = 0;
    while (collected < target) {
      const head = pipeline.chunks[0];
      if (!head) {
        break;
      }

      const needed = target - collected;
      if (head.length <= needed) {
        parts.push(head);
        pipeline.chunks.shift();
        collected += head.length;
      } else {
        parts.push(head.subarray(0, needed));
        pipeline.chunks[0] = head.subarray(needed);
        collected += needed;
      }
    }

    pipeline.bufferedBytes -= collected;
    this.consumedBytes += collected;

    if (!pipeline.ended && pipeline.child.stdout.isPaused() && pipeline.bufferedBytes < this.highWaterBytes / 2) {
      pipeline.child.stdout.resume();
    }

    return Buffer.concat(parts, collected);
  };

  public getPosition(): number {
    return this.startOffsetSec + Math.floor(this.consumedBytes / this.bytesPerSecond);
  }

  public getLength(): number {
    return this.lengthSec;
  }

  public getStatus(): DecoderStatus {
    if (this.closed) {
      return "closed";
    }

    const pipeline = this.pipeline;
    if (!pipeline || (pipeline.ended && pipeline.bufferedBytes === 0)) {
      return "eof";
    }

    return "ready";
  }

  public async seek(positionSec: number): Promise<void> {
    if (this.closed) {
      throw new SeekFailedError("Decoder is closed.");
    }
    if (!Number.isInteger(positionSec) || positionSec < 0) {
      throw new SeekFailedError("Position must be a whole number of seconds.", { position: positionSec });
    }
    if (this.lengthSec > 0 && positionSec > this.lengthSec) {
      throw new SeekFailedError("Position is beyond the end of the track.", {
        position: positionSec,
        length: this.lengthSec
      });
    }

    let next: DecodePipeline;
    try {
      next = await this.spawnPipeline(positionSec);
    } catch (error) {
      throw new SeekFailedError(`Cannot seek to ${positionSec}s: ${errorMessage(error)}`, {
        position: positionSec
      });
    }

    if (this.closed) {
      killPipeline(next);
      throw new SeekFailedError("Decoder closed during seek.");
    }

    const previous = this.pipeline;
    this.pipeline = next;
    this.startOffsetSec = positionSec;
    this.consumedBytes = 0;
    if (previous) {
      killPipeline(previous);
    }
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    if (this.pipeline) {
      killPipeline(this.pipeline);
      this.pipeline = null;
    }
  }

  private spawnPipeline(offsetSec: number): Promise<DecodePipeline> {
    const args = [
      "-hide_banner",
      "-nostdin",
      "-loglevel",
      "error",
      ...(offsetSec > 0 ? ["-ss", String(offsetSec)] : []),
      "-i",
      this.filePath,
      "-vn",
      "-f",
      "s16le",
      "-acodec",
      "pcm_s16le",
      "-ac",
      String(this.format.channels),
      "-ar",
      String(this.format.sampleRateHz),
      "pipe:1"
    ];

    return new Promise<DecodePipeline>((resolve, reject) => {
      const child = spawn(this.command, args, { stdio: ["ignore", "pipe", "pipe"] });
      const pipeline: DecodePipeline = {
        child,
        chunks: [],
        bufferedBytes: 0,
        ended: false
      };
      let settled = false;
      let stderrTail = "";

      const fail = (error: Error): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        killPipeline(pipeline);
        reject(error);
      };

      const timeout = setTimeout(() => {
        fail(new Error("ffmpeg produced no audio in time."));
      }, DECODER_START_TIMEOUT_MS);

      child.stdout.on("data", (chunk: Buffer) => {
        pipeline.chunks.push(chunk);
        pipeline.bufferedBytes += chunk.length;
        if (pipeline.bufferedBytes >= this.highWaterBytes) {
          child.stdout.pause();
        }

        if (!settled) {
          settled = true;
          clearTimeout(timeout);
          resolve(pipeline);
        }
      });

      child.stdout.on("end", () => {
        pipeline.ended = true;
      });

      child.stderr.setEncoding("utf8");
      child.stderr.on("data", (chunk: string) => {
        stderrTail = (stderrTail + chunk).slice(-STDERR_TAIL_LIMIT);
      });

      child.on("error", (error) => {
        fail(new Error(`ffmpeg process error: ${error.message}`));
      });

      child.on("close", (code) => {
        pipeline.ended = true;
        fail(new Error(`ffmpeg exited (code=${code ?? "n/a"}) without audio: ${stderrTail.trim()}`));
      });
    });
  }
}

export class FfmpegDecoderFactory implements DecoderFactory {
  private readonly command: string;
  private readonly format: PcmFormat;

  public constructor(options: { command?: string; format?: PcmFormat } = {}) {
    this.command = options.command ?? "ffmpeg";
    this.format = options.format ?? { ...OUTPUT_FORMAT };
  }

  public async open(filePath: string): Promise<Decoder> {
    const decoder = new FfmpegDecoder(filePath, {
      command: this.command,
      format: this.format,
      lengthSec: await probeLengthSec(filePath)
    });
    await decoder.start();
    return decoder;
  }
}
