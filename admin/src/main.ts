import { loadConfig } from "@hostpanel/lib/config.ts";
import { createLogger } from "@hostpanel/lib/shared/logger.ts";
import { installGracefulShutdown } from "@hostpanel/lib/shared/shutdown.ts";
import { createAdminHandler } from "./server.ts";
import { createNodeServer } from "./node-adapter.ts";

const log = createLogger("admin");

const config = loadConfig();
const handler = createAdminHandler({ loadSettings: () => loadConfig() });
const server = createNodeServer(handler);

server.listen(config.port, config.bindHost, () => {
  log.info("Server started", { host: config.bindHost, port: config.port, envPath: config.envPath });
  if (!config.actionToken) {
    log.warn("ACTION_TOKEN is not set; mutating routes accept unauthenticated requests.");
  }
  if (config.secretKey === "change-me-in-.env") {
    log.warn("SECRET_KEY still has its default value. Set it in .env before exposing the panel.");
  }
});

installGracefulShutdown(server, { service: "admin", logger: log });
