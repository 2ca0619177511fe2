import { sanitizeFilesConfig } from "../../services/settings-utils.js";
import { ControlSurface } from "../../services/control-surface.js";
import { FileBrowserService } from "../../services/file-browser.js";
import { MetadataService } from "../../services/metadata-service.js";
import { PlaybackController } from "../../services/playback-controller.js";
import { PlaybackScheduler } from "../../services/playback-scheduler.js";
import { PlaybackSession } from "../../services/playback/session.js";
import { SCHEDULER_INTERVAL_MS } from "../../../shared/constants.js";
import type { FilesConfig } from "../../../shared/types.js";
import type { RouteTable } from "../../http/route-table.js";
import { createLogger, type Logger } from "../../logger.js";
import type { JsonObject, MediaModule, ModuleContext } from "../module.js";
import { createFilesRoutes, type FilesRouteTargets } from "./files-routes.js";

interface FilesHandle extends FilesRouteTargets {
  scheduler: PlaybackScheduler;
}

export interface FilesModuleOptions {
  metadataService?: MetadataService;
  schedulerIntervalMs?: number;
}

export class FilesModule implements MediaModule {
  public readonly id = "files";
  public readonly name = "File browser";
  public readonly description = "Browse through local folders and play any music file.";
  public readonly routes: RouteTable;

  private readonly metadataService: MetadataService;
  private readonly schedulerIntervalMs: number;
  private readonly log: Logger;
  private config: FilesConfig = sanitizeFilesConfig(null);
  private handle: FilesHandle | null = null;

  public constructor(options: FilesModuleOptions = {}) {
    this.metadataService = options.metadataService ?? new MetadataService();
    this.schedulerIntervalMs = options.schedulerIntervalMs ?? SCHEDULER_INTERVAL_MS;
    this.log = createLogger({ module: this.id });
    this.routes = createFilesRoutes(() => this.requireHandle(), this.log);
  }

  public isOpen(): boolean {
    return this.handle !== null;
  }

  public async open(context: ModuleContext, config: JsonObject | null): Promise<void> {
    if (this.handle) {
      throw new Error(`Module "${this.id}" is already open.`);
    }

    this.setConfig(config);

    const getRootPath = (): string => this.config.path;
    const session = new PlaybackSession(context.output, context.decoders);
    const controller = new PlaybackController({
      session,
      tracks: this.metadataService,
      getRootPath
    });
    const surface = new ControlSurface(controller, new FileBrowserService(this.metadataService), getRootPath);
    const scheduler = new PlaybackScheduler(controller, this.schedulerIntervalMs);

    scheduler.start();
    this.handle = { controller, surface, scheduler };
    this.log.info({ path: this.config.path }, "Files module opened");
  }

  /**
   * Joins the scheduler before any playback state is released.
   */
  public async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }

    this.handle = null;
    await handle.scheduler.stop();
    await handle.controller.shutdown();
    this.log.info("Files module closed");
  }

  public getConfig(): JsonObject {
    return { path: this.config.path };
  }

  public setConfig(config: JsonObject | null): void {
    this.config = sanitizeFilesConfig(config);
  }

  private requireHandle(): FilesHandle {
    if (!this.handle) {
      throw new Error(`Module "${this.id}" is not open.`);
    }
    return this.handle;
  }
}
