import { node } from "@elysiajs/node";
import { createApp } from "./app";
import { loadConfig } from "./config";

const config = loadConfig();
const app = createApp({ config, adapter: node() });

if (config.nodeEnv !== "test") {
  app.listen({ port: config.port, hostname: config.host });
  console.log(`[Server] Cryptforge is running at ${config.host}:${config.port}`);
}

export type App = typeof app;
