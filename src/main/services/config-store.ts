import path from "node:path";
import { promises as fs } from "node:fs";
import { DEFAULT_CONFIG_PATH } from "../../shared/constants.js";
import { errorMessage } from "../../shared/errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { JsonObject } from "../modules/module.js";
import { isJsonObject } from "./settings-utils.js";

/**
 * JSON config file with one object section per module id, plus `httpd` for
 * the host. Sections are kept in memory between load() and save().
 */
export class ConfigStore {
  private readonly configPath: string;
  private readonly log: Logger;
  private sections = new Map<string, JsonObject>();

  public constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.log = createLogger({ component: "config" });
  }

  public getPath(): string {
    return this.configPath;
  }

  /**
   * Reads the file. A missing file yields no sections; an unreadable or
   * malformed one is logged and also yields no sections.
   */
  public async load(): Promise<void> {
    const next = new Map<string, JsonObject>();

    try {
      const data = await fs.readFile(this.configPath, "utf8");
      const parsed: unknown = JSON.parse(data);
      if (!isJsonObject(parsed)) {
        throw new Error("top-level value is not an object");
      }

      for (const [id, section] of Object.entries(parsed)) {
        if (isJsonObject(section)) {
          next.set(id, section);
        } else {
          this.log.warn({ section: id }, "Ignoring config section that is not an object");
        }
      }
    } catch (error) {
      if (!isMissingFile(error)) {
        this.log.warn({ path: this.configPath, error: errorMessage(error) }, "Cannot read config file, using defaults");
      }
    }

    this.sections = next;
  }

  public getSection(id: string): JsonObject | null {
    return this.sections.get(id) ?? null;
  }

  public setSection(id: string, section: JsonObject): void {
    this.sections.set(id, section);
  }

  public getSectionIds(): string[] {
    return [...this.sections.keys()];
  }

  public async save(): Promise<void> {
    const document = Object.fromEntries(this.sections);
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, `${JSON.stringify(document, null, 2)}\n`, "utf8");
    this.log.debug({ path: this.configPath }, "Config saved");
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
