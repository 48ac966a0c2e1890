import "dotenv/config";
import { buildApp } from "./app";
import { config } from "./config";

async function start() {
  const app = buildApp();
  const port = config.PORT;
  const host = config.HOST;

  app.log.warn("Running with in-memory storage (non-durable)");

  try {
    await app.listen({ port, host });
  } catch (error: unknown) {
    app.log.error({ err: error }, "Server failed to start");
    process.exit(1);
  }
}

void start();
