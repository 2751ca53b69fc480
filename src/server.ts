import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createServices } from "./services.js";

const cfg = loadConfig();
const services = createServices(cfg, createLogger(cfg.logLevel));
const app = buildApp(services);

const start = async () => {
  try {
    await app.listen({ port: cfg.port, host: cfg.host });
    app.log.info(`listening on :${cfg.port}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

// Running jobs are allowed to finish before the model is released
const shutdown = async (signal: string) => {
  app.log.info({ signal }, "Shutting down");
  try {
    await app.close();
    await services.orchestrator.drain();
    await services.models.release();
    process.exit(0);
  } catch (err) {
    app.log.error({ err }, "Shutdown failed");
    process.exit(1);
  }
};

process.once("SIGINT", (signal) => void shutdown(signal));
process.once("SIGTERM", (signal) => void shutdown(signal));

await start();
