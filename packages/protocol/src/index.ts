export * from "./types.js";
export * from "./notifications.js";

// LSP-shaped pieces BSP reuses verbatim.
export {
  DiagnosticSeverity,
  MessageType,
  type Diagnostic,
  type Position,
  type Range,
  type TextDocumentIdentifier,
} from "vscode-languageserver/node.js";
