export type ApiErrorKind =
  | "ConnectionTimeout"
  | "ConnectionRefused"
  | "ReadTimeout"
  | "TransportProtocolError"
  | "UnknownTransportError"
  | "ApplicationError";

export type TransportErrorKind = Exclude<ApiErrorKind, "ApplicationError">;

export const TRANSPORT_ERROR_MESSAGES: Record<TransportErrorKind, string> = {
  ConnectionTimeout: "连接超时",
  ConnectionRefused: "连接错误",
  ReadTimeout: "数据读取超时",
  TransportProtocolError: "Http错误",
  UnknownTransportError: "网络错误"
};

/**
 * The single error type surfaced to callers. Transport kinds carry fixed
 * localized text; `ApplicationError` carries the server message unchanged.
 */
export class ApiError extends Error {
  readonly kind: ApiErrorKind;

  constructor(kind: ApiErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ApiError";
    this.kind = kind;
  }

  static transport(kind: TransportErrorKind, cause?: unknown): ApiError {
    return new ApiError(kind, TRANSPORT_ERROR_MESSAGES[kind], { cause });
  }

  static application(message: string): ApiError {
    return new ApiError("ApplicationError", message);
  }
}

export type ApiResult<T> = { success: true; data: T } | { success: false; error: ApiError };

export function ok<T>(data: T): ApiResult<T> {
  return { success: true, data };
}

export function fail<T = never>(error: ApiError): ApiResult<T> {
  return { success: false, error };
}

const CONNECT_TIMEOUT_CODES = new Set(["UND_ERR_CONNECT_TIMEOUT", "ETIMEDOUT"]);
const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED"
]);
const READ_TIMEOUT_CODES = new Set(["UND_ERR_HEADERS_TIMEOUT", "UND_ERR_BODY_TIMEOUT"]);

function readString(value: unknown, key: "code" | "name"): string | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  if (!(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
}

function causeOf(value: unknown): unknown {
  if (value instanceof Error) return value.cause;
  return undefined;
}

// fetch wraps socket failures as TypeError("fetch failed") with the real error in `cause`,
// sometimes nested one level deeper (AggregateError for multi-address connects).
function errorCodes(err: unknown): string[] {
  const codes: string[] = [];
  let current: unknown = err;
  for (let depth = 0; depth < 4 && current !== undefined; depth += 1) {
    const code = readString(current, "code");
    if (code) codes.push(code);
    if (current instanceof AggregateError) {
      for (const inner of current.errors) {
        const innerCode = readString(inner, "code");
        if (innerCode) codes.push(innerCode);
      }
    }
    current = causeOf(current);
  }
  return codes;
}

/** Which part of the exchange was running when the request failed. */
export type TransportPhase = "connect" | "read";

/**
 * Maps a fetch failure to its transport kind. The request timeout signal covers the
 * whole exchange, so an abort counts as a connect timeout until a response has arrived.
 */
export function classifyTransportError(err: unknown, phase: TransportPhase = "connect"): TransportErrorKind {
  const name = readString(err, "name");
  if (name === "TimeoutError" || name === "AbortError") {
    return phase === "connect" ? "ConnectionTimeout" : "ReadTimeout";
  }

  const codes = errorCodes(err);
  if (codes.some((c) => CONNECT_TIMEOUT_CODES.has(c))) return "ConnectionTimeout";
  if (codes.some((c) => READ_TIMEOUT_CODES.has(c))) return "ReadTimeout";
  if (codes.some((c) => CONNECTION_CODES.has(c))) return "ConnectionRefused";
  if (codes.some((c) => c.startsWith("HPE_") || c === "UND_ERR_RESPONSE" || c === "UND_ERR_INFO")) {
    return "TransportProtocolError";
  }
  return "UnknownTransportError";
}
