/**
 * Compiler-side model: what a compiler hands to a problem reporter.
 */

export type ProblemSeverity = "info" | "warning" | "error";

/**
 * Source position as compilers report it. Line numbers are 1-based, columns
 * 0-based; every field is optional and filled in by whatever the compiler knows.
 */
export interface ProblemPosition {
  /** Filesystem path of the file the problem belongs to. Absent for target-level messages. */
  readonly sourceFile?: string;
  readonly line?: number;
  readonly startLine?: number;
  readonly startColumn?: number;
  readonly endLine?: number;
  readonly endColumn?: number;
  /** Column of the caret when only a single point is known. */
  readonly pointer?: number;
}

export interface Problem {
  readonly severity: ProblemSeverity;
  readonly message: string;
  readonly position: ProblemPosition;
  readonly diagnosticCode?: string;
  /** Compiler-specific grouping ("type", "deprecation", ...). Not forwarded to clients. */
  readonly category?: string;
}

/**
 * Contract a compiler driver calls into while compiling one target.
 * Implementations must tolerate calls from several workers in any order.
 */
export interface CompileProblemReporter {
  start(): void;
  logError(problem: Problem): void;
  logWarning(problem: Problem): void;
  logInfo(problem: Problem): void;
  /** Called for every compiled file, including ones without problems. */
  fileVisited(file: string): void;
  printSummary(): void;
  finish(): void;
}
