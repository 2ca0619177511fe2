import type { HttpdConfig } from "../../shared/types.js";
import { createLogger, logError, type Logger } from "../logger.js";
import type { JsonObject, MediaModule } from "../modules/module.js";
import type { ConfigStore } from "./config-store.js";
import type { DecoderFactory, ManagedOutputSink } from "./playback/backend.js";
import { checkRuntimeDependencies, type RuntimeDependencyReport } from "./runtime-dependencies.js";
import { isJsonObject, sanitizeHttpdConfig } from "./settings-utils.js";

const HTTPD_SECTION = "httpd";

/**
 * Config operations exposed over HTTP. A `section` of "" addresses every
 * section at once.
 */
export interface ConfigHost {
  getConfigs(section?: string): JsonObject;
  applyConfigs(document: JsonObject, section?: string): void;
  resetConfigs(): void;
  reloadConfigs(): Promise<void>;
  saveConfigs(): Promise<void>;
}

export interface AppControllerOptions {
  configStore: ConfigStore;
  modules: readonly MediaModule[];
  output: ManagedOutputSink;
  decoders: DecoderFactory;
  checkDependencies?: () => Promise<RuntimeDependencyReport>;
}

/**
 * Owns the shared output sink, the config file and the module lifecycle.
 */
export class AppController implements ConfigHost {
  private readonly configStore: ConfigStore;
  private readonly modules: readonly MediaModule[];
  private readonly output: ManagedOutputSink;
  private readonly decoders: DecoderFactory;
  private readonly checkDependencies: () => Promise<RuntimeDependencyReport>;
  private readonly log: Logger;
  private httpd: HttpdConfig = sanitizeHttpdConfig(null);
  private openModules: MediaModule[] = [];
  private shutdownPromise: Promise<void> | null = null;

  public constructor(options: AppControllerOptions) {
    this.configStore = options.configStore;
    this.modules = options.modules;
    this.output = options.output;
    this.decoders = options.decoders;
    this.checkDependencies = options.checkDependencies ?? (() => checkRuntimeDependencies());
    this.log = createLogger({ component: "host" });
  }

  public async init(): Promise<void> {
    await this.configStore.load();
    this.httpd = sanitizeHttpdConfig(this.configStore.getSection(HTTPD_SECTION));

    const dependencyReport = await this.checkDependencies();
    if (dependencyReport.missingRequired.length > 0) {
      this.log.error(
        { missing: dependencyReport.missingRequired },
        "Missing dependency, playback will fail until it is installed"
      );
    }
    if (dependencyReport.missingOptional.length > 0) {
      this.log.warn({ missing: dependencyReport.missingOptional }, "Optional dependency missing");
    }

    this.output.start();

    for (const module of this.modules) {
      try {
        await module.open({ output: this.output, decoders: this.decoders }, this.configStore.getSection(module.id));
        this.openModules.push(module);
        this.log.info({ module: module.id }, `Loaded module "${module.name}"`);
      } catch (error) {
        logError(this.log, error, "Cannot open module, continuing without it", { module: module.id });
        await this.closeModule(module);
      }
    }
  }

  public getHttpdConfig(): HttpdConfig {
    return { ...this.httpd };
  }

  public getOpenModules(): readonly MediaModule[] {
    return this.openModules;
  }

  public getConfigs(section = ""): JsonObject {
    const document: JsonObject = {};

    if (section === "" || section === HTTPD_SECTION) {
      document[HTTPD_SECTION] = this.httpdSection();
    }

    for (const module of this.openModules) {
      if (section === "" || section === module.id) {
        document[module.id] = module.getConfig();
      }
    }

    return document;
  }

  /**
   * Applies each `{ id: config }` entry of `document`. Unknown ids are ignored;
   * HTTP settings take effect on the next start.
   */
  public applyConfigs(document: JsonObject, section = ""): void {
    for (const [id, value] of Object.entries(document)) {
      if (section !== "" && section !== id) {
        continue;
      }

      const config = isJsonObject(value) ? value : null;
      if (id === HTTPD_SECTION) {
        this.httpd = sanitizeHttpdConfig(config);
        continue;
      }

      const module = this.openModules.find((candidate) => candidate.id === id);
      if (!module) {
        this.log.debug({ section: id }, "Ignoring config for unknown module");
        continue;
      }
      module.setConfig(config);
    }
  }

  public resetConfigs(): void {
    this.httpd = sanitizeHttpdConfig(null);
    for (const module of this.openModules) {
      module.setConfig(null);
    }
    this.log.info("Config reset to defaults");
  }

  public async reloadConfigs(): Promise<void> {
    await this.configStore.load();
    this.httpd = sanitizeHttpdConfig(this.configStore.getSection(HTTPD_SECTION));
    for (const module of this.openModules) {
      module.setConfig(this.configStore.getSection(module.id));
    }
    this.log.info({ path: this.configStore.getPath() }, "Config reloaded");
  }

  public async saveConfigs(): Promise<void> {
    this.configStore.setSection(HTTPD_SECTION, this.httpdSection());
    for (const module of this.openModules) {
      this.configStore.setSection(module.id, module.getConfig());
    }
    await this.configStore.save();
    this.log.info({ path: this.configStore.getPath() }, "Config saved");
  }

  /**
   * Saves the config, then closes modules in reverse order and stops the
   * output. Safe to call more than once.
   */
  public shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<void> {
    try {
      await this.saveConfigs();
    } catch (error) {
      logError(this.log, error, "Cannot save config", { path: this.configStore.getPath() });
    }

    const modules = [...this.openModules].reverse();
    this.openModules = [];
    for (const module of modules) {
      await this.closeModule(module);
    }

    await this.output.stop();
  }

  private async closeModule(module: MediaModule): Promise<void> {
    try {
      await module.close();
    } catch (error) {
      logError(this.log, error, "Cannot close module", { module: module.id });
    }
  }

  private httpdSection(): JsonObject {
    return { port: this.httpd.port, host: this.httpd.host };
  }
}
