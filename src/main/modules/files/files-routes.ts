import {
  AircatError,
  DirectoryNotFoundError,
  InvalidFileError,
  SeekFailedError,
  errorMessage
} from "../../../shared/errors.js";
import { parseInteger, parseUnsignedInteger } from "../../../shared/format.js";
import { RouteTable, type RouteResponse } from "../../http/route-table.js";
import type { Logger } from "../../logger.js";
import type { ControlSurface } from "../../services/control-surface.js";
import type { PlaybackController } from "../../services/playback-controller.js";

export interface FilesRouteTargets {
  controller: PlaybackController;
  surface: ControlSurface;
}

const OK: RouteResponse = { statusCode: 200 };

function reply(statusCode: number, body: string | object): RouteResponse {
  return { statusCode, body };
}

/**
 * Builds the control routes of the files module. `resolve` returns the live
 * handle and throws when the module is not open.
 */
export function createFilesRoutes(resolve: () => FilesRouteTargets, log: Logger): RouteTable {
  const routes = new RouteTable();

  const parseIndex = (resource: string): number | null => {
    const index = parseInteger(resource);
    return index == null || index < 0 ? null : index;
  };

  const playlistFailure = (error: unknown, action: string): RouteResponse => {
    if (!(error instanceof AircatError)) {
      throw error;
    }
    log.warn({ action, code: error.code, error: error.message }, "Playlist request failed");
    return reply(500, "Playlist error");
  };

  routes.addExtended("/playlist/add", "PUT", async ({ resource }) => {
    try {
      await resolve().controller.add(resource);
      return OK;
    } catch (error) {
      if (error instanceof InvalidFileError) {
        return reply(406, "File is not supported");
      }
      throw error;
    }
  });

  routes.addExtended("/playlist/play", "PUT", async ({ resource }) => {
    const index = parseIndex(resource);
    if (index == null) {
      return reply(400, "Bad index");
    }

    try {
      await resolve().controller.play(index);
      return OK;
    } catch (error) {
      return playlistFailure(error, "play");
    }
  });

  routes.addExtended("/playlist/remove", "PUT", async ({ resource }) => {
    const index = parseIndex(resource);
    if (index == null) {
      return reply(400, "Bad index");
    }

    try {
      await resolve().controller.remove(index);
      return OK;
    } catch (error) {
      return playlistFailure(error, "remove");
    }
  });

  routes.add("/playlist/flush", "PUT", async () => {
    await resolve().controller.flush();
    return OK;
  });

  routes.add("/playlist", "GET", async () => {
    try {
      return reply(200, await resolve().surface.playlist());
    } catch (error) {
      log.error({ error: errorMessage(error) }, "Cannot build playlist document");
      return reply(500, "Playlist error");
    }
  });

  routes.addExtended("/play", "PUT", async ({ resource }) => {
    const { controller } = resolve();
    let index = -1;

    if (resource.length > 0) {
      try {
        index = await controller.add(resource);
      } catch (error) {
        if (error instanceof InvalidFileError) {
          return reply(406, "File is not supported");
        }
        throw error;
      }
    }

    try {
      await controller.play(index);
      return OK;
    } catch (error) {
      if (error instanceof AircatError) {
        return reply(406, "Cannot play the file");
      }
      throw error;
    }
  });

  routes.add("/pause", "PUT", async () => {
    await resolve().controller.pause();
    return OK;
  });

  routes.add("/stop", "PUT", async () => {
    await resolve().controller.stop();
    return OK;
  });

  routes.add("/prev", "PUT", async () => {
    await resolve().controller.prev();
    return OK;
  });

  routes.add("/next", "PUT", async () => {
    await resolve().controller.next();
    return OK;
  });

  routes.addExtended("/seek", "PUT", async ({ resource }) => {
    const position = parseUnsignedInteger(resource);
    if (position == null) {
      return reply(400, "Bad position");
    }

    try {
      await resolve().controller.seek(position);
      return OK;
    } catch (error) {
      if (error instanceof SeekFailedError) {
        return reply(400, "Bad position");
      }
      throw error;
    }
  });

  routes.addExtended("/status", "GET", async ({ resource }) => {
    try {
      return reply(200, await resolve().surface.status(resource.startsWith("img")));
    } catch (error) {
      log.error({ error: errorMessage(error) }, "Cannot build status document");
      return reply(500, "Status error");
    }
  });

  routes.addExtended("/list", "GET", async ({ resource }) => {
    try {
      return reply(200, await resolve().surface.list(resource));
    } catch (error) {
      if (error instanceof DirectoryNotFoundError) {
        return reply(404, "Bad directory");
      }
      throw error;
    }
  });

  return routes;
}
