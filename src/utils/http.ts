import axios, { AxiosInstance, AxiosResponse } from "axios";
import * as http2 from "node:http2";
import * as zlib from "node:zlib";
import pLimit from "p-limit";
import { NET } from "../config.js";
import { TransportError } from "../errors.js";
import { debug } from "../logger.js";
import { HttpVersion, IndexRequest, TransportResponse } from "../types.js";
import { Deadline } from "./deadline.js";

const concurrencyLimit = pLimit(NET.CONCURRENCY);

const httpClient: AxiosInstance = axios.create({
  maxRedirects: 5,
  responseType: "arraybuffer",
  decompress: true,
  validateStatus: () => true,
  headers: {
    "User-Agent": NET.USER_AGENT
  }
});

const CONNECT_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "ERR_HTTP2_INVALID_SESSION"
]);

const PROTOCOL_CODES = new Set(["ERR_HTTP2_GOAWAY_SESSION", "ERR_HTTP2_SESSION_ERROR", "ERR_HTTP2_ERROR"]);

const TLS_CODE = /^(ERR_SSL_|ERR_TLS_|CERT_|UNABLE_TO_|DEPTH_ZERO_|SELF_SIGNED_)/;

const REJECTED_STREAM = /REFUSED_STREAM|PROTOCOL_ERROR|HTTP_1_1_REQUIRED/;

/**
 * What the HTTP/2 session had observed when a failure happened.
 */
export interface SessionFacts {
  readonly connected: boolean;
  readonly goAway: boolean;
}

export interface SendOptions {
  readonly version: HttpVersion;
  readonly deadline: Deadline;
}

function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map any failure of an HTTP exchange to one flat reason.
 *
 * @param error - Raw error raised by the HTTP client.
 * @param facts - Session state; failures before connecting are connection failures.
 * @returns Tagged transport error wrapping the raw error.
 */
export function classifyTransportFailure(
  error: unknown,
  facts: SessionFacts = { connected: true, goAway: false }
): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  const code = errorCodeOf(error);
  const message = messageOf(error);
  if (facts.goAway || (code !== undefined && PROTOCOL_CODES.has(code))) {
    return new TransportError("ProtocolRejected", message, code, error);
  }
  if (code === "ERR_HTTP2_STREAM_ERROR" && REJECTED_STREAM.test(message)) {
    return new TransportError("ProtocolRejected", message, code, error);
  }
  if (!facts.connected || (code !== undefined && (CONNECT_CODES.has(code) || TLS_CODE.test(code)))) {
    return new TransportError("ConnectFailed", message, code, error);
  }
  return new TransportError("Other", message, code, error);
}

/**
 * Lowercase header names and flatten multi-valued headers.
 */
export function normaliseHeaders(headers: Readonly<Record<string, unknown>>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (key.startsWith(":")) {
      continue;
    }
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string" || typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

function decodeContent(headers: Record<string, string>, body: Buffer): Buffer {
  const encoding = headers["content-encoding"];
  if (encoding === "gzip" || encoding === "x-gzip") {
    return zlib.gunzipSync(body);
  }
  return body;
}

function timeoutFor(deadline: Deadline): number {
  return Math.max(1, Math.ceil(deadline.remainingMs()));
}

function requestHttp11(request: IndexRequest, deadline: Deadline): Promise<TransportResponse> {
  return httpClient
    .get<ArrayBuffer>(request.url, {
      headers: { ...request.headers },
      timeout: timeoutFor(deadline)
    })
    .then(
      (response: AxiosResponse<ArrayBuffer>) => ({
        status: response.status,
        headers: normaliseHeaders(response.headers),
        body: Buffer.from(response.data)
      }),
      (error: unknown) => {
        throw classifyTransportFailure(error);
      }
    );
}

function requestHttp2(request: IndexRequest, deadline: Deadline): Promise<TransportResponse> {
  return new Promise((resolve, reject) => {
    const url = new URL(request.url);
    const facts = { connected: false, goAway: false };
    let settled = false;
    let responded = false;
    let status = 0;
    let headers: Record<string, string> = {};
    const chunks: Buffer[] = [];

    const session = http2.connect(url.origin);

    const fail = (error: unknown): void => {
      if (settled) {
        return;
      }
      settled = true;
      session.destroy();
      reject(classifyTransportFailure(error, facts));
    };

    session.setTimeout(timeoutFor(deadline), () => {
      fail(new TransportError("Other", `HTTP/2 request to ${url.origin} timed out`, "ETIMEDOUT"));
    });
    session.on("connect", () => {
      facts.connected = true;
    });
    session.on("goaway", errorCode => {
      facts.goAway = true;
      debug(`HTTP/2 GOAWAY (code ${errorCode}) from ${url.origin}`);
    });
    session.on("error", fail);

    const requestHeaders: http2.OutgoingHttpHeaders = {
      ":method": "GET",
      ":path": `${url.pathname}${url.search}`,
      "user-agent": NET.USER_AGENT
    };
    for (const [key, value] of Object.entries(request.headers)) {
      requestHeaders[key.toLowerCase()] = value;
    }

    const stream = session.request(requestHeaders);

    // Without response headers the peer dropped the exchange.
    const closedEarly = (): TransportError => {
      if (facts.goAway || stream.rstCode === http2.constants.NGHTTP2_REFUSED_STREAM) {
        return new TransportError(
          "ProtocolRejected",
          `HTTP/2 stream refused with code ${stream.rstCode}`,
          "ERR_HTTP2_STREAM_ERROR"
        );
      }
      if (!responded) {
        return new TransportError(
          "ConnectFailed",
          `HTTP/2 connection to ${url.origin} closed before a response`,
          "ERR_HTTP2_STREAM_ERROR"
        );
      }
      return new TransportError("Other", `HTTP/2 stream closed with code ${stream.rstCode}`, "ERR_HTTP2_STREAM_ERROR");
    };

    stream.on("response", responseHeaders => {
      responded = true;
      status = responseHeaders[":status"] ?? 0;
      headers = normaliseHeaders(responseHeaders);
    });
    stream.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });
    stream.on("end", () => {
      if (settled) {
        return;
      }
      if (!responded) {
        fail(closedEarly());
        return;
      }
      settled = true;
      session.close();
      try {
        resolve({ status, headers, body: decodeContent(headers, Buffer.concat(chunks)) });
      } catch (error) {
        reject(new TransportError("Other", `Cannot decode response body: ${messageOf(error)}`, errorCodeOf(error), error));
      }
    });
    stream.on("close", () => {
      if (settled) {
        return;
      }
      fail(closedEarly());
    });
    stream.on("error", fail);
  });
}

/**
 * Issue one GET over the requested protocol version.
 *
 * HTTP/2 is spoken with prior knowledge (no upgrade round trip); HTTP/1.1 uses
 * standard negotiation. Non-2xx statuses resolve; only failed exchanges reject.
 *
 * @param request - Transport-neutral request.
 * @param options - Protocol version and the deadline bounding socket activity.
 * @returns Status, lowercased headers and decoded body.
 * @throws TransportError tagged with the failure reason.
 */
export async function sendRequest(request: IndexRequest, options: SendOptions): Promise<TransportResponse> {
  debug(`GET ${request.url} over HTTP/${options.version}`);
  return concurrencyLimit(() =>
    options.version === "2" ? requestHttp2(request, options.deadline) : requestHttp11(request, options.deadline)
  );
}

export { httpClient };
