import path from "node:path";
import { fileURLToPath } from "node:url";

import { buildApp } from "./app.js";
import { config, createCapabilities } from "./services/openaiClient.js";

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const clientDir = path.resolve(currentDir, "../../client/dist");

const app = await buildApp({
  config,
  clientDir,
  createCapabilities: (log) => createCapabilities(config, log)
});

try {
  await app.listen({
    host: config.host,
    port: config.port
  });

  app.log.info(`Tutor server ready at http://${config.host}:${config.port}`);
} catch (error) {
  app.log.error(error);
  process.exit(1);
}
