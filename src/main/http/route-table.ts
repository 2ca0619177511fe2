export type HttpMethod = "GET" | "PUT";

export interface RouteRequest {
  method: HttpMethod;
  /** Whatever follows the route pattern, URL-decoded, without the leading slash. */
  resource: string;
  body: unknown;
}

export interface RouteResponse {
  statusCode: number;
  body?: string | object;
}

export type RouteHandler = (request: RouteRequest) => Promise<RouteResponse> | RouteResponse;

export interface RouteDefinition {
  pattern: string;
  methods: readonly HttpMethod[];
  /** Accept trailing path segments and pass them on as the resource. */
  extended: boolean;
  handler: RouteHandler;
}

export interface RouteMatch {
  route: RouteDefinition;
  resource: string;
}

export const NOT_FOUND_RESPONSE: RouteResponse = {
  statusCode: 404,
  body: "Not found"
};

function trimTrailingSlash(value: string): string {
  return value.length > 1 && value.endsWith("/") ? value.slice(0, -1) : value;
}

function decodeResource(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}

/**
 * Registry of (pattern, method) -> handler for one module. Exact routes match
 * the whole path; extended routes also match anything below them.
 */
export class RouteTable {
  private readonly routes: RouteDefinition[] = [];

  public add(pattern: string, methods: HttpMethod | readonly HttpMethod[], handler: RouteHandler): this {
    return this.register(pattern, methods, false, handler);
  }

  public addExtended(pattern: string, methods: HttpMethod | readonly HttpMethod[], handler: RouteHandler): this {
    return this.register(pattern, methods, true, handler);
  }

  public match(method: HttpMethod, rawPath: string): RouteMatch | null {
    const requestPath = trimTrailingSlash(rawPath.startsWith("/") ? rawPath : `/${rawPath}`);

    for (const route of this.routes) {
      if (!route.methods.includes(method)) {
        continue;
      }

      if (requestPath === route.pattern) {
        return { route, resource: "" };
      }

      const prefix = route.pattern === "/" ? "/" : `${route.pattern}/`;
      if (route.extended && requestPath.startsWith(prefix)) {
        const resource = decodeResource(requestPath.slice(prefix.length));
        if (resource !== null) {
          return { route, resource };
        }
      }
    }

    return null;
  }

  public async dispatch(method: HttpMethod, rawPath: string, body: unknown = null): Promise<RouteResponse> {
    const matched = this.match(method, rawPath);
    if (!matched) {
      return NOT_FOUND_RESPONSE;
    }

    return await matched.route.handler({
      method,
      resource: matched.resource,
      body
    });
  }

  private register(
    pattern: string,
    methods: HttpMethod | readonly HttpMethod[],
    extended: boolean,
    handler: RouteHandler
  ): this {
    this.routes.push({
      pattern: trimTrailingSlash(pattern.startsWith("/") ? pattern : `/${pattern}`),
      methods: typeof methods === "string" ? [methods] : methods,
      extended,
      handler
    });
    return this;
  }
}
