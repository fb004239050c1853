import { createApp } from "./app";
import { config, validateConfig } from "./config";
import { buildServices } from "./container";
import { createLogger, errorMessage, getLogger, setRootLogger } from "./logging";

validateConfig(config);
setRootLogger(createLogger({ level: config.logLevel, file: config.logFile || undefined }));
const logger = getLogger("server");

if (config.allowedDirectories.length === 0) {
  logger.warn("local_transcriptions_disabled", { reason: "ALLOWED_DIRECTORIES is empty" });
}

const services = buildServices(config);
const app = createApp(services);

const server = app.listen(config.port, () => {
  logger.info("listening", { port: config.port, model: config.modelPath, version: config.serviceVersion });
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("shutdown", { signal });
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await services.close();
  logger.info("shutdown_complete");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("shutdown_failed", { message: errorMessage(err) });
        process.exit(1);
      }
    );
  });
}
