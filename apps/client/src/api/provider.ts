import { createSilentLogger, type Logger } from "@evcs/observability";

import { createActions, type ClientActions } from "../actions";
import { StatusPoller } from "../poller/statusPoller";
import { createSessionStore, type SessionStore } from "../stores/sessionStore";
import type { ApiMode, ChargingApi } from "./client";
import { createHttpClient } from "./httpClient";
import { createMockClient } from "./mockClient";
import type { FetchFn } from "./transport";

export type ChargingClientConfig = {
  mode: ApiMode;
  baseUrl: string;
  requestTimeoutMs?: number;
  pollIntervalMs?: number;
  fetchFn?: FetchFn;
  mockDelayMs?: number;
  mockPollsPerStage?: number;
  mockAccounts?: Array<{ username: string; password: string; isAdmin: boolean }>;
  logger?: Logger;
};

export type ChargingClient = {
  api: ChargingApi;
  session: SessionStore;
  actions: ClientActions;
  poller: StatusPoller;
};

export function createChargingClient(config: ChargingClientConfig): ChargingClient {
  const logger = config.logger ?? createSilentLogger();
  const session = createSessionStore();
  const getToken = () => session.currentToken() || null;

  const api =
    config.mode === "http"
      ? createHttpClient({
          baseUrl: config.baseUrl,
          getToken,
          fetchFn: config.fetchFn,
          requestTimeoutMs: config.requestTimeoutMs,
          logger: logger.child({ component: "http" })
        })
      : createMockClient({
          getToken,
          delayMs: config.mockDelayMs,
          pollsPerStage: config.mockPollsPerStage,
          accounts: config.mockAccounts,
          logger: logger.child({ component: "mock" })
        });

  const actions = createActions({ api, session, logger: logger.child({ component: "actions" }) });
  const poller = new StatusPoller({
    api,
    session,
    intervalMs: config.pollIntervalMs,
    logger: logger.child({ component: "poller" })
  });

  return { api, session, actions, poller };
}
