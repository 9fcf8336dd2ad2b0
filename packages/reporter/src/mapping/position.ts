/**
 * Compiler positions → protocol ranges.
 */
import type { Range } from "@compile-reporter/protocol";
import type { ProblemPosition } from "../problem.js";

// Compilers count lines from 1, the protocol from 0.
function toZeroBasedLine(line: number): number {
  return line - 1;
}

/**
 * Map a compiler position to a protocol range.
 *
 * End fields fall back to the already-resolved start, so a position that only
 * knows its `pointer` becomes an empty range (a point) rather than a span.
 */
export function toProtocolRange(position: ProblemPosition): Range {
  const line = position.line === undefined ? undefined : toZeroBasedLine(position.line);

  const startLine = (position.startLine === undefined ? undefined : toZeroBasedLine(position.startLine)) ?? line ?? 0;
  const startCharacter = position.startColumn ?? position.pointer ?? 0;

  const endLine = (position.endLine === undefined ? undefined : toZeroBasedLine(position.endLine)) ?? line ?? startLine;
  const endCharacter = position.endColumn ?? position.pointer ?? startCharacter;

  return {
    start: { line: startLine, character: startCharacter },
    end: { line: endLine, character: endCharacter },
  };
}
