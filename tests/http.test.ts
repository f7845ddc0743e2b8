import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import * as http from "node:http";
import * as http2 from "node:http2";
import * as net from "node:net";
import * as zlib from "node:zlib";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RegistryIoError, TransportError } from "../src/errors.js";
import { SparseIndex, SparseIndexAccessor } from "../src/index/sparse-index.js";
import { fetchSparseMetadata } from "../src/negotiator.js";
import { createPackageRef } from "../src/types.js";
import { Deadline } from "../src/utils/deadline.js";
import { classifyTransportFailure, httpClient, normaliseHeaders, sendRequest } from "../src/utils/http.js";

const LISTING = '{"name":"demo-crate","vers":"0.9.0","deps":[],"cksum":"aa","features":{},"yanked":false}\n';

function arrayBufferOf(text: string): ArrayBuffer {
  const bytes = Buffer.from(text);
  const out = new ArrayBuffer(bytes.length);
  new Uint8Array(out).set(bytes);
  return out;
}

function codedError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("classifyTransportFailure", () => {
  it("tags refused connections as connection failures", () => {
    const failure = classifyTransportFailure(codedError("connect ECONNREFUSED 127.0.0.1:443", "ECONNREFUSED"));
    expect(failure.reason).toBe("ConnectFailed");
    expect(failure.errorCode).toBe("ECONNREFUSED");
  });

  it("tags TLS certificate failures as connection failures", () => {
    expect(classifyTransportFailure(codedError("certificate has expired", "CERT_HAS_EXPIRED")).reason).toBe(
      "ConnectFailed"
    );
  });

  it("tags any failure before the session connected as a connection failure", () => {
    const failure = classifyTransportFailure(new Error("socket hang up"), { connected: false, goAway: false });
    expect(failure.reason).toBe("ConnectFailed");
  });

  it("tags GOAWAY session errors as protocol rejections", () => {
    const failure = classifyTransportFailure(codedError("New streams cannot be created", "ERR_HTTP2_GOAWAY_SESSION"));
    expect(failure.reason).toBe("ProtocolRejected");
  });

  it("tags failures after a received GOAWAY frame as protocol rejections", () => {
    const failure = classifyTransportFailure(new Error("stream reset"), { connected: true, goAway: true });
    expect(failure.reason).toBe("ProtocolRejected");
  });

  it("tags refused streams as protocol rejections", () => {
    const failure = classifyTransportFailure(
      codedError("Stream closed with error code NGHTTP2_REFUSED_STREAM", "ERR_HTTP2_STREAM_ERROR")
    );
    expect(failure.reason).toBe("ProtocolRejected");
  });

  it("leaves other failures untagged", () => {
    const failure = classifyTransportFailure(codedError("maxContentLength size exceeded", "ERR_BAD_RESPONSE"));
    expect(failure.reason).toBe("Other");
  });

  it("passes through errors that are already classified", () => {
    const original = new TransportError("Other", "timed out", "ETIMEDOUT");
    expect(classifyTransportFailure(original, { connected: false, goAway: false })).toBe(original);
  });
});

describe("normaliseHeaders", () => {
  it("lowercases names, joins arrays and drops pseudo headers", () => {
    expect(
      normaliseHeaders({ ":status": 200, ETag: '"abc"', "Set-Cookie": ["a=1", "b=2"], "content-length": 12 })
    ).toEqual({ etag: '"abc"', "set-cookie": "a=1, b=2", "content-length": "12" });
  });
});

describe("sendRequest over HTTP/1.1", () => {
  const config = {
    url: "https://index.example.test/de/mo/demo-crate",
    headers: {}
  } as InternalAxiosRequestConfig;

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns status, normalised headers and body", async () => {
    const success = {
      status: 200,
      statusText: "OK",
      headers: { ETag: '"v1"', "Content-Type": "text/plain" },
      config,
      data: arrayBufferOf('{"name":"demo-crate","vers":"0.9.0"}\n')
    } satisfies AxiosResponse<ArrayBuffer>;
    const spy = vi.spyOn(httpClient, "get").mockResolvedValueOnce(success);

    const response = await sendRequest(
      { url: "https://index.example.test/de/mo/demo-crate", headers: { "accept-encoding": "gzip" } },
      { version: "1.1", deadline: Deadline.after(5000) }
    );

    expect(response.status).toBe(200);
    expect(response.headers).toEqual({ etag: '"v1"', "content-type": "text/plain" });
    expect(response.body.toString("utf8")).toBe('{"name":"demo-crate","vers":"0.9.0"}\n');
    expect(spy).toHaveBeenCalledWith(
      "https://index.example.test/de/mo/demo-crate",
      expect.objectContaining({ headers: { "accept-encoding": "gzip" } })
    );
  });

  it("rejects with a tagged transport error", async () => {
    vi.spyOn(httpClient, "get").mockRejectedValueOnce(new AxiosError("connect ECONNREFUSED", "ECONNREFUSED"));

    const failure = await sendRequest(
      { url: "https://index.example.test/de/mo/demo-crate", headers: {} },
      { version: "1.1", deadline: Deadline.after(5000) }
    ).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({ reason: "ConnectFailed", errorCode: "ECONNREFUSED" });
  });
});

describe("sendRequest against local servers", () => {
  const closers: Array<() => Promise<void>> = [];

  beforeEach(() => {
    vi.stubEnv("no_proxy", "*");
    vi.stubEnv("npm_config_no_proxy", "*");
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await Promise.all(closers.splice(0).map(close => close()));
  });

  async function listen(server: net.Server): Promise<number> {
    await new Promise<void>(resolve => {
      server.listen(0, "127.0.0.1", () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("server has no TCP address");
    }
    return address.port;
  }

  function closeServer(server: net.Server): Promise<void> {
    return new Promise(resolve => {
      server.close(() => resolve());
    });
  }

  async function startHttp2(
    onStream: (stream: http2.ServerHttp2Stream, headers: http2.IncomingHttpHeaders) => void
  ): Promise<string> {
    const server = http2.createServer();
    const sessions = new Set<http2.ServerHttp2Session>();
    server.on("session", session => {
      sessions.add(session);
      session.on("error", () => undefined);
    });
    server.on("stream", (stream, headers) => {
      stream.on("error", () => undefined);
      onStream(stream, headers);
    });
    const port = await listen(server);
    closers.push(() => {
      for (const session of sessions) {
        session.destroy();
      }
      return closeServer(server);
    });
    return `http://127.0.0.1:${port}`;
  }

  async function startHttp11(): Promise<{ origin: string; connections: () => number; requests: string[] }> {
    const requests: string[] = [];
    let connections = 0;
    const server = http.createServer((request, response) => {
      requests.push(`${request.httpVersion} ${request.url ?? ""}`);
      response.writeHead(200, { "content-type": "text/plain" });
      response.end(LISTING);
    });
    server.on("connection", () => {
      connections += 1;
    });
    const port = await listen(server);
    closers.push(() => {
      server.closeAllConnections();
      return closeServer(server);
    });
    return { origin: `http://127.0.0.1:${port}`, connections: () => connections, requests };
  }

  async function startDropping(): Promise<{ origin: string; connections: () => number }> {
    let connections = 0;
    const server = net.createServer(socket => {
      connections += 1;
      socket.on("error", () => undefined);
      socket.destroy();
    });
    const port = await listen(server);
    closers.push(() => closeServer(server));
    return { origin: `http://127.0.0.1:${port}`, connections: () => connections };
  }

  it("speaks HTTP/2 with prior knowledge and decodes a gzip body", async () => {
    const seen: http2.IncomingHttpHeaders[] = [];
    const origin = await startHttp2((stream, headers) => {
      seen.push(headers);
      stream.respond({ ":status": 200, "content-encoding": "gzip", etag: '"v1"' });
      stream.end(zlib.gzipSync(Buffer.from(LISTING)));
    });

    const response = await sendRequest(
      { url: `${origin}/de/mo/demo-crate`, headers: { "accept-encoding": "gzip", "cargo-protocol": "version=1" } },
      { version: "2", deadline: Deadline.after(3000) }
    );

    expect(response.status).toBe(200);
    expect(response.headers.etag).toBe('"v1"');
    expect(response.body.toString("utf8")).toBe(LISTING);
    expect(seen).toHaveLength(1);
    expect(seen[0]?.[":path"]).toBe("/de/mo/demo-crate");
    expect(seen[0]?.["cargo-protocol"]).toBe("version=1");
    expect(seen[0]?.["user-agent"]).toBe("crate-publish-watch/1.0.0");
  });

  it("returns non-2xx statuses over HTTP/2", async () => {
    const origin = await startHttp2(stream => {
      stream.respond({ ":status": 404 });
      stream.end();
    });

    const response = await sendRequest(
      { url: `${origin}/de/mo/demo-crate`, headers: {} },
      { version: "2", deadline: Deadline.after(3000) }
    );

    expect(response.status).toBe(404);
    expect(response.body).toHaveLength(0);
  });

  it("tags a GOAWAY from the server as a protocol rejection", async () => {
    const origin = await startHttp2(stream => {
      stream.session?.goaway(http2.constants.NGHTTP2_PROTOCOL_ERROR);
    });

    const failure = await sendRequest(
      { url: `${origin}/de/mo/demo-crate`, headers: {} },
      { version: "2", deadline: Deadline.after(3000) }
    ).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({ reason: "ProtocolRejected" });
  });

  it("tags a refused stream as a protocol rejection", async () => {
    const origin = await startHttp2(stream => {
      stream.close(http2.constants.NGHTTP2_REFUSED_STREAM);
    });

    const failure = await sendRequest(
      { url: `${origin}/de/mo/demo-crate`, headers: {} },
      { version: "2", deadline: Deadline.after(3000) }
    ).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({ reason: "ProtocolRejected" });
  });

  it("rejects when the connection is dropped before a response", async () => {
    const { origin } = await startDropping();

    const failure = await sendRequest(
      { url: `${origin}/de/mo/demo-crate`, headers: {} },
      { version: "2", deadline: Deadline.after(3000) }
    ).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({ reason: "ConnectFailed" });
  });

  it("downgrades exactly once to reach a server without HTTP/2", async () => {
    const server = await startHttp11();

    const record = await fetchSparseMetadata(
      new SparseIndex(`sparse+${server.origin}/`),
      "demo-crate",
      undefined,
      Deadline.after(3000)
    );

    expect(record?.versions.map(entry => entry.version)).toEqual(["0.9.0"]);
    expect(server.requests.filter(line => line.startsWith("1.1 "))).toEqual(["1.1 /de/mo/demo-crate"]);
    expect(server.connections()).toBe(2);
  });

  it("reports a dropped connection as a failure after one downgrade instead of not published", async () => {
    const server = await startDropping();
    const accessor = new SparseIndexAccessor(new SparseIndex(`sparse+${server.origin}/`));

    const failure = accessor.lookup(createPackageRef("demo-crate", "0.9.0"), undefined, Deadline.after(3000));

    await expect(failure).rejects.toBeInstanceOf(RegistryIoError);
    expect(server.connections()).toBe(2);
  });
});
