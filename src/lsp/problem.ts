import { ErrorCodes, LSPErrorCodes, ResponseError } from "vscode-languageserver/node.js";

import { isLookupError } from "../core/errors.js";
import type { SessionState } from "../core/session.js";

/**
 * Maps a failure inside a request handler onto the JSON-RPC error the client
 * gets back. Only the failing request is affected.
 */
export function toResponseError(e: unknown, state: SessionState): ResponseError<void> {
  if (e instanceof ResponseError) return e;
  if (!isLookupError(e)) {
    return new ResponseError<void>(ErrorCodes.InternalError, "internal error");
  }

  switch (e.code) {
    case "INVALID_STATE":
      return new ResponseError<void>(state === "uninitialized" ? ErrorCodes.ServerNotInitialized : ErrorCodes.InvalidRequest, e.message);
    case "CANCELLED":
      return new ResponseError<void>(LSPErrorCodes.RequestCancelled, e.message);
    case "INVALID_ARGUMENT":
      return new ResponseError<void>(ErrorCodes.InvalidParams, e.message);
    case "BACKEND_TRANSIENT":
      return new ResponseError<void>(ErrorCodes.InternalError, e.message);
    case "CONFIG":
    case "DICTIONARY_LOAD":
      return new ResponseError<void>(ErrorCodes.InternalError, "internal error");
  }
}
