import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { AircatError } from "../../shared/errors.js";
import { createLogger, logError } from "../logger.js";
import { NOT_FOUND_RESPONSE, type HttpMethod, type RouteResponse, type RouteTable } from "./route-table.js";

const TEXT_PLAIN = "text/plain; charset=utf-8";

export interface RouteMount {
  id: string;
  routes: RouteTable;
}

function requestPath(url: string): string {
  const queryStart = url.indexOf("?");
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

function toHttpMethod(method: string): HttpMethod {
  return method === "PUT" ? "PUT" : "GET";
}

function sendRouteResponse(reply: FastifyReply, response: RouteResponse): FastifyReply {
  reply.code(response.statusCode);

  if (response.body === undefined) {
    return reply.send();
  }
  if (typeof response.body === "string") {
    return reply.type(TEXT_PLAIN).send(response.body);
  }
  return reply.send(response.body);
}

/**
 * Builds the HTTP front end: every mount's route table answers GET and PUT
 * below `/<id>`. The caller owns listen() and close().
 */
export function createHttpServer(mounts: readonly RouteMount[]): FastifyInstance {
  const log = createLogger({ component: "httpd" });
  const server = Fastify({ logger: false });

  // Bodies of any other content type reach the handlers as raw text.
  server.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
    done(null, body);
  });

  for (const mount of mounts) {
    const prefix = `/${mount.id}`;
    const handler = async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
      const rawPath = requestPath(request.url).slice(prefix.length);
      const response = await mount.routes.dispatch(toHttpMethod(request.method), rawPath, request.body ?? null);
      return sendRouteResponse(reply, response);
    };

    server.route({ method: ["GET", "PUT"], url: prefix, handler });
    server.route({ method: ["GET", "PUT"], url: `${prefix}/*`, handler });
  }

  server.setNotFoundHandler(async (_request, reply) => {
    return sendRouteResponse(reply, NOT_FOUND_RESPONSE);
  });

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof AircatError) {
      log.warn({ method: request.method, url: request.url, code: error.code }, error.message);
      return sendRouteResponse(reply, { statusCode: error.statusCode, body: error.message });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return sendRouteResponse(reply, { statusCode, body: error.message });
    }

    logError(log, error, "Request failed", { method: request.method, url: request.url });
    return sendRouteResponse(reply, { statusCode: 500, body: "Internal error" });
  });

  server.addHook("onResponse", async (request, reply) => {
    log.debug({ method: request.method, url: request.url, statusCode: reply.statusCode }, "Request handled");
  });

  return server;
}
