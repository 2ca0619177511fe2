export interface PcmFormat {
  sampleRateHz: number;
  channels: number;
}

export type DecoderStatus = "ready" | "eof" | "closed";

/**
 * Pulls interleaved signed 16-bit little-endian PCM. Returns at most
 * `maxBytes`, possibly fewer, and an empty buffer when nothing is queued.
 */
export type PcmSource = (maxBytes: number) => Buffer;

export interface Decoder {
  readonly filePath: string;
  readonly format: PcmFormat;
  read: PcmSource;
  /** Current position in whole seconds. */
  getPosition(): number;
  /** Track length in whole seconds, 0 when unknown. */
  getLength(): number;
  getStatus(): DecoderStatus;
  seek(positionSec: number): Promise<void>;
  close(): Promise<void>;
}

export interface DecoderFactory {
  open(filePath: string): Promise<Decoder>;
}

export interface OutputStream {
  readonly id: number;
  readonly format: PcmFormat;
}

export interface OutputSink {
  readonly format: PcmFormat;
  addStream(format: PcmFormat, source: PcmSource): OutputStream;
  playStream(stream: OutputStream): void;
  pauseStream(stream: OutputStream): void;
  removeStream(stream: OutputStream): void;
}

/**
 * An output sink whose lifetime the host manages.
 */
export interface ManagedOutputSink extends OutputSink {
  start(): void;
  stop(): Promise<void>;
}
