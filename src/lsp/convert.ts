import {
  CompletionItemKind,
  MarkupKind,
  TextDocumentSyncKind,
  type CompletionItem,
  type CompletionList,
  type Hover,
  type ServerCapabilities,
  type SignatureHelp,
} from "vscode-languageserver/node.js";

import type { CompletionResult, HoverResult, SignatureResult } from "../core/session.js";

export function serverCapabilities(commands: readonly string[]): ServerCapabilities {
  return {
    textDocumentSync: TextDocumentSyncKind.Full,
    hoverProvider: true,
    signatureHelpProvider: { triggerCharacters: [" "] },
    completionProvider: { triggerCharacters: [" "], resolveProvider: false },
    executeCommandProvider: { commands: [...commands] },
  };
}

export function toHover(result: HoverResult | null): Hover | null {
  if (!result) return null;
  return {
    contents: { kind: MarkupKind.Markdown, value: result.markdown },
    range: result.span,
  };
}

export function toSignatureHelp(result: SignatureResult | null): SignatureHelp | null {
  if (!result) return null;
  return {
    signatures: [{ label: result.label }],
    activeSignature: 0,
    activeParameter: 0,
  };
}

/** Rank order survives the client's own sorting through `sortText`. */
export function toCompletionList(result: CompletionResult): CompletionList {
  const width = String(result.items.length).length;
  const items = result.items.map((item, i): CompletionItem => ({
    label: item.label,
    kind: CompletionItemKind.Text,
    detail: item.detail,
    documentation: item.documentation === undefined ? undefined : { kind: MarkupKind.Markdown, value: item.documentation },
    sortText: String(i).padStart(width, "0"),
    filterText: item.filterText,
    textEdit: { range: item.replace, newText: item.insertText },
  }));
  return { isIncomplete: result.isIncomplete, items };
}
