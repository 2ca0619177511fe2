import type { RouteTable } from "../http/route-table.js";
import type { DecoderFactory, OutputSink } from "../services/playback/backend.js";

export type JsonObject = Record<string, unknown>;

/**
 * Shared resources the host hands to every module when it opens.
 */
export interface ModuleContext {
  output: OutputSink;
  decoders: DecoderFactory;
}

/**
 * A pluggable unit of the server. The host opens it with its saved config,
 * mounts its routes under `/<id>`, reads its config back for persistence and
 * closes it on shutdown.
 */
export interface MediaModule {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly routes: RouteTable;
  open(context: ModuleContext, config: JsonObject | null): Promise<void>;
  close(): Promise<void>;
  getConfig(): JsonObject;
  /** Replaces the whole config; null restores the defaults. */
  setConfig(config: JsonObject | null): void;
}
