import dotenv from "dotenv";
import { createApp } from "./app.js";
import { loadConfig, type ServerConfig } from "./config/index.js";
import { ConfigurationError } from "./connectors/salesforce/errors.js";
import { SalesforceClient } from "./connectors/salesforce/client.js";
import { CrmEngine } from "./engine.js";
import { createLogger, setLogLevel } from "./utils/logger.js";

dotenv.config();

const logger = createLogger("Server");

function readConfig(): ServerConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error("Invalid configuration", error, { field: error.field });
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = readConfig();
  setLogLevel(config.logLevel);

  const client = new SalesforceClient(config.salesforce);
  const engine = new CrmEngine(client);
  const app = createApp({ engine, records: client });

  const server = app.listen(config.port, () => {
    logger.info("Listening", { port: config.port });
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();
