#!/usr/bin/env node
import { parseArgs } from "node:util";
import type { FastifyInstance } from "fastify";
import { APP_NAME, APP_VERSION, DEFAULT_CONFIG_PATH } from "../shared/constants.js";
import { createHttpServer } from "./http/server.js";
import { createConfigRoutes } from "./http/config-routes.js";
import { createLogger, logError, setVerbose } from "./logger.js";
import { FilesModule } from "./modules/files/files-module.js";
import { AppController } from "./services/app-controller.js";
import { ConfigStore } from "./services/config-store.js";
import { FfmpegDecoderFactory } from "./services/playback/ffmpeg-decoder.js";
import { PcmOutput } from "./services/playback/pcm-output.js";

const USAGE = `Usage: aircat [options]

Options:
  -c, --config=FILE   Use FILE as configuration file (default: ${DEFAULT_CONFIG_PATH})
  -v, --verbose       Log debug messages
  -h, --help          Print this help and exit
      --version       Print the version and exit
`;

interface CliOptions {
  configPath: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

function parseCliOptions(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: "string", short: "c" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      version: { type: "boolean", default: false }
    },
    strict: true,
    allowPositionals: false
  });

  return {
    configPath: values.config ?? DEFAULT_CONFIG_PATH,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
    version: values.version ?? false
  };
}

let controller: AppController | null = null;
let server: FastifyInstance | null = null;
let shutdownPromise: Promise<void> | null = null;

async function shutdown(signal: string): Promise<void> {
  if (shutdownPromise) {
    return shutdownPromise;
  }

  const log = createLogger({ component: "main" });
  log.info({ signal }, "Shutting down");

  shutdownPromise = (async () => {
    if (server) {
      try {
        await server.close();
      } catch (error) {
        logError(log, error, "HTTP server shutdown failed");
      }
    }

    if (controller) {
      await controller.shutdown();
    }
  })();

  await shutdownPromise;
}

async function bootstrap(options: CliOptions): Promise<void> {
  setVerbose(options.verbose);
  const log = createLogger({ component: "main" });
  log.info({ version: APP_VERSION, config: options.configPath }, `Starting ${APP_NAME}`);

  const output = new PcmOutput();
  const decoders = new FfmpegDecoderFactory({ format: output.format });
  controller = new AppController({
    configStore: new ConfigStore(options.configPath),
    modules: [new FilesModule()],
    output,
    decoders
  });
  await controller.init();

  server = createHttpServer([
    ...controller.getOpenModules().map((module) => ({ id: module.id, routes: module.routes })),
    { id: "config", routes: createConfigRoutes(controller) }
  ]);

  const { port, host } = controller.getHttpdConfig();
  await server.listen({ port, host });
  log.info({ port, host }, "HTTP server listening");

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logError(log, error, "Shutdown failed");
          process.exit(1);
        }
      );
    });
  }
}

let cliOptions: CliOptions;
try {
  cliOptions = parseCliOptions(process.argv.slice(2));
} catch (error) {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
  process.exit(1);
}

if (cliOptions.help) {
  process.stdout.write(USAGE);
} else if (cliOptions.version) {
  process.stdout.write(`${APP_NAME} ${APP_VERSION}\n`);
} else {
  void bootstrap(cliOptions).catch(async (error: unknown) => {
    logError(createLogger({ component: "main" }), error, "Failed to start");
    try {
      await shutdown("startup-failure");
    } finally {
      process.exit(1);
    }
  });
}
