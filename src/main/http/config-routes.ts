import type { ConfigHost } from "../services/app-controller.js";
import { isJsonObject } from "../services/settings-utils.js";
import { RouteTable } from "./route-table.js";

export function createConfigRoutes(host: ConfigHost): RouteTable {
  const routes = new RouteTable();

  routes.add("/default", "PUT", () => {
    host.resetConfigs();
    return { statusCode: 200 };
  });

  routes.add("/reload", "PUT", async () => {
    await host.reloadConfigs();
    return { statusCode: 200 };
  });

  routes.add("/save", "PUT", async () => {
    await host.saveConfigs();
    return { statusCode: 200 };
  });

  routes.addExtended("/", "GET", ({ resource }) => {
    return { statusCode: 200, body: host.getConfigs(resource) };
  });

  routes.addExtended("/", "PUT", ({ resource, body }) => {
    if (!isJsonObject(body)) {
      return { statusCode: 400, body: "Bad config" };
    }

    host.applyConfigs(body, resource);
    return { statusCode: 200 };
  });

  return routes;
}
