import { z } from "zod";

function optionalNonEmptyString() {
  return z.preprocess((v) => {
    if (typeof v !== "string") return v;
    const trimmed = v.trim();
    return trimmed.length === 0 ? undefined : trimmed;
  }, z.string().min(1).optional());
}

const configSchema = z.object({
  serviceName: z.string().default("charging-client"),

  apiMode: z.enum(["http", "mock"]).default("http"),
  apiBaseUrl: z.string().url().default("http://127.0.0.1:8000"),
  requestTimeoutMs: z.coerce.number().int().positive().default(10_000),
  pollIntervalMs: z.coerce.number().int().min(100).max(60_000).default(1000),

  username: optionalNonEmptyString(),
  password: optionalNonEmptyString(),

  // Submitted once after login when both are set.
  submitModeLabel: optionalNonEmptyString(),
  submitAmount: optionalNonEmptyString(),
  submitBatterySize: optionalNonEmptyString(),

  mockDelayMs: z.coerce.number().int().min(0).default(0),
  mockPollsPerStage: z.coerce.number().int().positive().default(3)
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfigFromEnv(env: NodeJS.ProcessEnv): AppConfig {
  return configSchema.parse({
    serviceName: env.SERVICE_NAME,

    apiMode: env.API_MODE,
    apiBaseUrl: env.API_BASE_URL,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    pollIntervalMs: env.POLL_INTERVAL_MS,

    username: env.CLIENT_USERNAME,
    password: env.CLIENT_PASSWORD,

    submitModeLabel: env.SUBMIT_MODE,
    submitAmount: env.SUBMIT_AMOUNT,
    submitBatterySize: env.SUBMIT_BATTERY_SIZE,

    mockDelayMs: env.MOCK_DELAY_MS,
    mockPollsPerStage: env.MOCK_POLLS_PER_STAGE
  });
}
