import { existsSync } from "node:fs";
import path from "node:path";

import fastifyStatic from "@fastify/static";
import type { FastifyPluginAsync } from "fastify";

type LandingRoutesOptions = {
  root: string;
};

/** Serves the built client at `/`. */
export const landingRoutes: FastifyPluginAsync<LandingRoutesOptions> = async (app, options) => {
  if (!existsSync(path.join(options.root, "index.html"))) {
    app.log.warn({ root: options.root }, "Client build not found, landing page is not served");
    return;
  }

  await app.register(fastifyStatic, {
    root: options.root,
    index: "index.html"
  });
};
