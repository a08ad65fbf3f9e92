import { config, loadApiConfig } from "./config/index.js";
import { loadConfiguredMailboxes } from "./config/mailboxes.js";
import { logger } from "./config/logger.js";
import { createApiApp, startApiServer } from "./api/app.js";
import { mailboxRegistry, reloadMailboxes } from "./router/index.js";
import { createSmtpServer, startSmtpServer } from "./smtp/index.js";

async function main(): Promise<void> {
  const mailboxes = await loadConfiguredMailboxes(config);
  mailboxRegistry.publish(mailboxes);
  logger.info({ mailboxes: mailboxes.map((m) => m.name) }, "Mailbox configuration loaded");

  const smtpServer = createSmtpServer(mailboxRegistry);
  await startSmtpServer(smtpServer);

  const apiConfig = loadApiConfig();
  if (!apiConfig.api.apiKey) {
    logger.warn("API_KEY not set, API endpoints are unprotected");
  }
  const apiServer = startApiServer(createApiApp(apiConfig), apiConfig);

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Shutting down...");

    await new Promise<void>((resolve) => smtpServer.close(() => resolve()));
    logger.info("SMTP server closed");

    await new Promise<void>((resolve) => apiServer.close(() => resolve()));
    logger.info("API server closed");

    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGHUP", () => void reloadMailboxes(mailboxRegistry, config));

  process.on("uncaughtException", (err) => {
    logger.fatal({ error: err }, "Uncaught exception");
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    logger.fatal({ reason }, "Unhandled rejection");
    process.exit(1);
  });
}

main().catch((err) => {
  logger.fatal({ error: err }, "Failed to start application");
  process.exit(1);
});
