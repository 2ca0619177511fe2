import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createConfigRoutes } from "../../http/config-routes.js";
import { RouteTable } from "../../http/route-table.js";
import type { JsonObject, MediaModule, ModuleContext } from "../../modules/module.js";
import { AppController } from "../app-controller.js";
import { ConfigStore } from "../config-store.js";
import { FakeDecoderFactory, FakeOutputSink } from "./fakes.js";

class RecordingModule implements MediaModule {
  public readonly id: string;
  public readonly name: string;
  public readonly description = "Test module";
  public readonly routes = new RouteTable();
  public config: JsonObject = { level: 1 };
  public openedWith: JsonObject | null = null;
  public closed = false;
  private readonly failOpen: boolean;

  public constructor(id: string, failOpen = false) {
    this.id = id;
    this.name = `Module ${id}`;
    this.failOpen = failOpen;
  }

  public async open(_context: ModuleContext, config: JsonObject | null): Promise<void> {
    if (this.failOpen) {
      throw new Error("device busy");
    }
    this.openedWith = config;
    this.setConfig(config);
  }

  public async close(): Promise<void> {
    this.closed = true;
  }

  public getConfig(): JsonObject {
    return { ...this.config };
  }

  public setConfig(config: JsonObject | null): void {
    this.config = config ?? { level: 1 };
  }
}

let directory: string;
let configPath: string;
let output: FakeOutputSink;

function createController(modules: MediaModule[]): AppController {
  return new AppController({
    configStore: new ConfigStore(configPath),
    modules,
    output,
    decoders: new FakeDecoderFactory(),
    checkDependencies: async () => ({ missingRequired: [], missingOptional: [] })
  });
}

beforeEach(async () => {
  directory = await fs.mkdtemp(path.join(os.tmpdir(), "aircat-host-"));
  configPath = path.join(directory, "aircat.conf");
  output = new FakeOutputSink();
  await fs.writeFile(configPath, JSON.stringify({ httpd: { port: 9000 }, radio: { level: 5 } }));
});

afterEach(async () => {
  await fs.rm(directory, { recursive: true, force: true });
});

describe("AppController", () => {
  it("opens modules with their saved section and starts the output", async () => {
    const radio = new RecordingModule("radio");
    const controller = createController([radio]);

    await controller.init();

    expect(output.started).toBe(true);
    expect(radio.openedWith).toEqual({ level: 5 });
    expect(controller.getHttpdConfig()).toEqual({ port: 9000, host: "0.0.0.0" });
    expect(controller.getOpenModules()).toEqual([radio]);
  });

  it("carries on without a module that fails to open", async () => {
    const broken = new RecordingModule("broken", true);
    const radio = new RecordingModule("radio");
    const controller = createController([broken, radio]);

    await controller.init();

    expect(broken.closed).toBe(true);
    expect(controller.getOpenModules().map((module) => module.id)).toEqual(["radio"]);
  });

  it("reads, applies and resets configs by section", async () => {
    const radio = new RecordingModule("radio");
    const controller = createController([radio]);
    await controller.init();

    expect(controller.getConfigs()).toEqual({ httpd: { port: 9000, host: "0.0.0.0" }, radio: { level: 5 } });
    expect(controller.getConfigs("radio")).toEqual({ radio: { level: 5 } });

    controller.applyConfigs({ radio: { level: 7 }, httpd: { port: 9100 } }, "radio");
    expect(controller.getConfigs()).toEqual({ httpd: { port: 9000, host: "0.0.0.0" }, radio: { level: 7 } });

    controller.applyConfigs({ httpd: { port: 9100 }, unknown: { level: 2 } });
    expect(controller.getHttpdConfig()).toEqual({ port: 9100, host: "0.0.0.0" });

    controller.resetConfigs();
    expect(controller.getConfigs()).toEqual({ httpd: { port: 8080, host: "0.0.0.0" }, radio: { level: 1 } });
  });

  it("reloads the file into every module", async () => {
    const radio = new RecordingModule("radio");
    const controller = createController([radio]);
    await controller.init();
    controller.applyConfigs({ radio: { level: 9 } });

    await controller.reloadConfigs();

    expect(radio.config).toEqual({ level: 5 });
  });

  it("saves every section and closes everything on shutdown", async () => {
    const radio = new RecordingModule("radio");
    const controller = createController([radio]);
    await controller.init();
    controller.applyConfigs({ radio: { level: 3 } });

    await controller.shutdown();
    await controller.shutdown();

    expect(JSON.parse(await fs.readFile(configPath, "utf8"))).toEqual({
      httpd: { port: 9000, host: "0.0.0.0" },
      radio: { level: 3 }
    });
    expect(radio.closed).toBe(true);
    expect(output.stopped).toBe(true);
    expect(controller.getOpenModules()).toEqual([]);
  });
});

describe("config routes", () => {
  it("serve the host config operations", async () => {
    const radio = new RecordingModule("radio");
    const controller = createController([radio]);
    await controller.init();
    const routes = createConfigRoutes(controller);

    expect(await routes.dispatch("GET", "/httpd")).toEqual({
      statusCode: 200,
      body: { httpd: { port: 9000, host: "0.0.0.0" } }
    });
    expect(await routes.dispatch("PUT", "/", { radio: { level: 4 } })).toEqual({ statusCode: 200 });
    expect(radio.config).toEqual({ level: 4 });
    expect(await routes.dispatch("PUT", "/radio", "level=4")).toEqual({ statusCode: 400, body: "Bad config" });

    expect(await routes.dispatch("PUT", "/save")).toEqual({ statusCode: 200 });
    expect(JSON.parse(await fs.readFile(configPath, "utf8"))).toEqual({
      httpd: { port: 9000, host: "0.0.0.0" },
      radio: { level: 4 }
    });

    expect(await routes.dispatch("PUT", "/default")).toEqual({ statusCode: 200 });
    expect(radio.config).toEqual({ level: 1 });

    expect(await routes.dispatch("PUT", "/reload")).toEqual({ statusCode: 200 });
    expect(radio.config).toEqual({ level: 4 });
  });
});
