import { createSilentLogger, newTraceId, type Logger } from "@evcs/observability";
import type { ZodType, ZodTypeDef } from "zod";

import { ApiError, classifyTransportError, fail, ok, type ApiResult, type TransportPhase } from "./errors";
import { envelopeSchema } from "./schemas";

export type HttpMethod = "GET" | "POST";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export type TransportOptions = {
  baseUrl: string;
  getToken?: () => string | null;
  fetchFn?: FetchFn;
  /** Upper bound on the whole exchange, from connecting through reading the body. */
  requestTimeoutMs?: number;
  logger?: Logger;
};

export type Transport = {
  call: <T>(
    method: HttpMethod,
    path: string,
    body: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>
  ) => Promise<ApiResult<T>>;
};

const APPLICATION_ERROR_CODE = -1;

export function createTransport(options: TransportOptions): Transport {
  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const getToken = options.getToken ?? (() => null);
  const fetchFn: FetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  const requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
  const logger = options.logger ?? createSilentLogger();

  const buildInit = (method: HttpMethod, body: unknown): RequestInit => {
    const headers = new Headers({ Accept: "application/json" });
    const token = getToken();
    if (token) headers.set("Authorization", `Bearer ${token}`);

    const init: RequestInit = { method, headers, signal: AbortSignal.timeout(requestTimeoutMs) };
    if (body !== undefined) {
      headers.set("Content-Type", "application/json");
      init.body = JSON.stringify(body);
    }
    return init;
  };

  return {
    call: async (method, path, body, schema) => {
      const traceId = newTraceId();
      const url = `${baseUrl}${path.startsWith("/") ? "" : "/"}${path}`;
      const startedAt = Date.now();

      let phase: TransportPhase = "connect";
      let res: Response;
      let text: string;
      try {
        res = await fetchFn(url, buildInit(method, body));
        phase = "read";
        text = await res.text();
      } catch (err: unknown) {
        const kind = classifyTransportError(err, phase);
        logger.warn({ traceId, method, path, phase, kind, err }, "request failed");
        return fail(ApiError.transport(kind, err));
      }

      logger.debug({ traceId, method, path, status: res.status, tookMs: Date.now() - startedAt }, "request done");

      let json: unknown;
      try {
        json = text ? JSON.parse(text) : undefined;
      } catch (err: unknown) {
        logger.warn({ traceId, method, path, status: res.status }, "response is not json");
        return fail(ApiError.transport("TransportProtocolError", err));
      }

      const envelope = envelopeSchema.safeParse(json);
      if (!envelope.success) {
        logger.warn({ traceId, method, path, status: res.status, issues: envelope.error.issues }, "malformed envelope");
        return fail(ApiError.transport("TransportProtocolError", envelope.error));
      }

      if (envelope.data.code === APPLICATION_ERROR_CODE) {
        const message = envelope.data.message ?? "";
        logger.info({ traceId, method, path, message }, "server rejected request");
        return fail(ApiError.application(message));
      }

      const decoded = schema.safeParse(envelope.data.data ?? null);
      if (!decoded.success) {
        logger.warn({ traceId, method, path, issues: decoded.error.issues }, "payload decode failed");
        return fail(ApiError.transport("TransportProtocolError", decoded.error));
      }
      return ok(decoded.data);
    }
  };
}
