import { validateHeaderValue } from "node:http";
import { AuthError, RegistryIoError, TransportError } from "./errors.js";
import type { SparseIndex } from "./index/sparse-index.js";
import { debug } from "./logger.js";
import { CrateRecord, IndexRequest, TransportResponse } from "./types.js";
import { Deadline } from "./utils/deadline.js";
import { sendRequest } from "./utils/http.js";
import { SecretToken } from "./utils/secret.js";

/**
 * Add the `Authorization` header. The token is exposed only here.
 *
 * @throws AuthError if the token is not a valid header value.
 */
export function withAuthorization(request: IndexRequest, token: SecretToken | undefined): IndexRequest {
  if (!token) {
    return request;
  }
  const value = token.expose();
  try {
    validateHeaderValue("authorization", value);
  } catch {
    throw new AuthError("Registry token contains characters that are not allowed in an HTTP header", {
      registry: new URL(request.url).origin
    });
  }
  return { url: request.url, headers: { ...request.headers, authorization: value } };
}

function shouldDowngrade(error: unknown): error is TransportError {
  return error instanceof TransportError && (error.reason === "ConnectFailed" || error.reason === "ProtocolRejected");
}

/**
 * Fetch the index entry of one crate from a sparse registry.
 *
 * The first attempt uses HTTP/2 with prior knowledge. A connection failure or
 * a session termination causes exactly one retry of the same request over
 * HTTP/1.1; every other failure propagates.
 *
 * @param index - Sparse index that builds the request and parses the response.
 * @param crateName - Crate to look up.
 * @param token - Optional registry token.
 * @param deadline - Bound for the whole exchange.
 * @returns The crate record, or undefined when the registry does not know the crate.
 */
export async function fetchSparseMetadata(
  index: SparseIndex,
  crateName: string,
  token: SecretToken | undefined,
  deadline: Deadline
): Promise<CrateRecord | undefined> {
  const request = withAuthorization(index.makeCacheRequest(crateName), token);

  let response: TransportResponse;
  try {
    response = await sendRequest(request, { version: "2", deadline });
  } catch (error) {
    if (!shouldDowngrade(error)) {
      throw wrapFailure(error, crateName, index);
    }
    debug(`HTTP/2 sparse index request failed (${error.reason}: ${error.message}), trying HTTP/1.1`);
    try {
      response = await sendRequest(request, { version: "1.1", deadline });
    } catch (retryError) {
      throw wrapFailure(retryError, crateName, index);
    }
  }

  return index.parseCacheResponse(crateName, response);
}

function wrapFailure(error: unknown, crateName: string, index: SparseIndex): unknown {
  if (error instanceof TransportError) {
    return new RegistryIoError(
      `failed fetching sparse metadata for ${crateName}: ${error.message}`,
      { package: crateName, registry: index.baseUrl },
      error
    );
  }
  return error;
}
