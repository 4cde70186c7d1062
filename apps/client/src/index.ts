export * from "./api/client";
export * from "./api/errors";
export { createHttpClient } from "./api/httpClient";
export { createMockClient, MOCK_ERRORS } from "./api/mockClient";
export { createChargingClient, type ChargingClient, type ChargingClientConfig } from "./api/provider";
export { createTransport, type FetchFn, type HttpMethod, type Transport, type TransportOptions } from "./api/transport";
export * from "./actions";
export { loadConfigFromEnv, type AppConfig } from "./config";
export { StatusPoller, type StatusPollerListener, type StatusPollerOptions, type TickOutcome } from "./poller/statusPoller";
export * from "./poller/statusTransition";
export { createSessionStore, type SessionState, type SessionStore } from "./stores/sessionStore";
