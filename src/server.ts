import { startServer } from "./http/server.js";
import { loadConfig } from "./config.js";

const config = loadConfig();

const { server, port } = await startServer(config);

function shutdown(): void {
  console.log("shutting down");
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

console.log(`listening on :${port}`);
