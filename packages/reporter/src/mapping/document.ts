import type { BuildTargetIdentifier, TextDocumentIdentifier } from "@compile-reporter/protocol";
import { URI } from "vscode-uri";
import type { ProblemPosition } from "../problem.js";

export function fileDocument(fsPath: string): TextDocumentIdentifier {
  return { uri: URI.file(fsPath).toString() };
}

/**
 * Document a problem is published under: its source file, or the build target
 * itself for target-level messages that carry no file.
 */
export function problemDocument(position: ProblemPosition, target: BuildTargetIdentifier): TextDocumentIdentifier {
  if (position.sourceFile === undefined) return { uri: target.uri };
  return fileDocument(position.sourceFile);
}
