import { createConnection, LSPErrorCodes, ProposedFeatures, type Connection } from "vscode-languageserver/node.js";

import type { Session } from "../core/session.js";
import { logError, lspLogger, type Logger } from "../logger.js";
import { serverCapabilities, toCompletionList, toHover, toSignatureHelp } from "./convert.js";
import { toResponseError } from "./problem.js";

const SERVER_NAME = "lexicon-lsp";
const VERSION = "0.1.0";

export interface LanguageServerOptions {
  session: Session;
  /** defaults to stdio, as negotiated from argv by the protocol library */
  connection?: Connection;
  logger?: Logger;
  /** called with the exit code once the client sends `exit` */
  onExit?: (code: number) => void;
}

/**
 * Binds a Session to a protocol connection. Requests that fail answer with
 * a JSON-RPC error; notifications that fail are logged and dropped.
 */
export function startLanguageServer(opts: LanguageServerOptions): Connection {
  const { session } = opts;
  const connection = opts.connection ?? createConnection(ProposedFeatures.all);
  const log = opts.logger ?? lspLogger;
  const onExit = opts.onExit ?? ((code: number) => process.exit(code));

  const request = async <T>(method: string, run: () => T | Promise<T>): Promise<T> => {
    try {
      return await run();
    } catch (e) {
      const err = toResponseError(e, session.state);
      if (err.code === LSPErrorCodes.RequestCancelled) {
        log.debug({ method }, "request cancelled");
      } else {
        logError(log, e, { method });
      }
      throw err;
    }
  };

  const notify = (method: string, run: () => void): void => {
    try {
      run();
    } catch (e) {
      logError(log, e, { method });
    }
  };

  connection.onInitialize((params) =>
    request("initialize", () => {
      const { commands } = session.initialize();
      log.info({ client: params.clientInfo?.name, rootUri: params.rootUri }, "initialize");
      return {
        capabilities: serverCapabilities(commands),
        serverInfo: { name: SERVER_NAME, version: VERSION },
      };
    }),
  );

  connection.onInitialized(() => {
    log.info("client initialized");
  });

  connection.onDidOpenTextDocument(({ textDocument }) =>
    notify("textDocument/didOpen", () => session.didOpen(textDocument.uri, textDocument.text, textDocument.version)),
  );

  connection.onDidChangeTextDocument(({ textDocument, contentChanges }) =>
    notify("textDocument/didChange", () => {
      // full sync: the last change carries the whole text
      const last = contentChanges[contentChanges.length - 1];
      if (!last) return;
      session.didChange(textDocument.uri, last.text, textDocument.version);
    }),
  );

  connection.onDidCloseTextDocument(({ textDocument }) =>
    notify("textDocument/didClose", () => session.didClose(textDocument.uri)),
  );

  connection.onHover(({ textDocument, position }, token) =>
    request("textDocument/hover", async () => toHover(await session.hover(textDocument.uri, position, token))),
  );

  connection.onSignatureHelp(({ textDocument, position }, token) =>
    request("textDocument/signatureHelp", async () => toSignatureHelp(await session.signatureHelp(textDocument.uri, position, token))),
  );

  connection.onCompletion(({ textDocument, position }, token) =>
    request("textDocument/completion", async () => toCompletionList(await session.completion(textDocument.uri, position, token))),
  );

  connection.onExecuteCommand(({ command, arguments: args }) =>
    request("workspace/executeCommand", () => session.executeCommand(command, args ?? [])),
  );

  connection.onShutdown(() => request("shutdown", () => session.shutdown()));

  connection.onExit(() => {
    let code = 1;
    try {
      code = session.exit();
    } catch (e) {
      logError(log, e, { method: "exit" });
    }
    log.info({ code }, "exiting");
    onExit(code);
  });

  connection.listen();
  return connection;
}
