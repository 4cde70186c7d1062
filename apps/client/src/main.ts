import { createLogger } from "@evcs/observability";
import dotenv from "dotenv";

import { createChargingClient } from "./api/provider";
import { loadConfigFromEnv } from "./config";

async function main(): Promise<void> {
  dotenv.config();

  const config = loadConfigFromEnv(process.env);
  const logger = createLogger(config.serviceName);

  if (!config.username || !config.password) {
    throw new Error("Missing credentials: set CLIENT_USERNAME and CLIENT_PASSWORD");
  }

  const client = createChargingClient({
    mode: config.apiMode,
    baseUrl: config.apiBaseUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    pollIntervalMs: config.pollIntervalMs,
    mockDelayMs: config.mockDelayMs,
    mockPollsPerStage: config.mockPollsPerStage,
    mockAccounts: [{ username: config.username, password: config.password, isAdmin: false }],
    logger
  });

  const login = await client.actions.login(config.username, config.password);
  if (!login.ok) {
    throw new Error(`Login failed: ${login.message}`);
  }
  logger.info({ mode: config.apiMode, baseUrl: config.apiBaseUrl, ...client.actions.sessionStatus() }, login.message);

  if (config.submitModeLabel && config.submitAmount && config.submitBatterySize) {
    const submitted = await client.actions.submitRequest(
      config.submitModeLabel,
      config.submitAmount,
      config.submitBatterySize
    );
    if (submitted.ok) logger.info(submitted.message);
    else logger.warn({ message: submitted.message }, "charging request rejected");
  }

  let lastLine = "";
  client.poller.subscribe({
    onView: (view) => {
      const line = [view.statusText, view.queueText, view.requestId ?? ""].join(" | ");
      if (line === lastLine) return;
      lastLine = line;
      logger.info({ state: view.state, queue: view.queueText, requestId: view.requestId }, view.statusText);
    },
    onCompleted: (message) => {
      logger.info(message);
      void client.actions.queryBills().then((bills) => {
        if (bills.ok) logger.info({ rows: bills.data.rows }, bills.message);
        else logger.warn({ message: bills.message }, "bill query failed");
      });
    },
    onError: (error) => {
      logger.warn({ kind: error.kind }, error.message);
    }
  });
  client.poller.start();

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down...");
    client.poller.dispose();
    const out = client.actions.logout();
    logger.info(out.message);
    process.exit(0);
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
