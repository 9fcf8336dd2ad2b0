import type { Diagnostic, TextDocumentIdentifier } from "@compile-reporter/protocol";
import { debug } from "../debug.js";

export type DiagnosticSet = readonly Diagnostic[];

const EMPTY: DiagnosticSet = Object.freeze([]);

/**
 * Accumulated diagnostics per document for one compilation task.
 *
 * Documents are keyed by URI string, so two identifiers for the same URI share
 * one entry. Sets are frozen and replaced wholesale on append: a set handed out
 * for publishing never changes afterwards, and the stored set is always the one
 * last returned for that document.
 */
export class DiagnosticStore {
  readonly #sets = new Map<string, DiagnosticSet>();

  /** Current set for `doc`, installing an empty one if the document is new. */
  ensure(doc: TextDocumentIdentifier): DiagnosticSet {
    const existing = this.#sets.get(doc.uri);
    if (existing) return existing;
    this.#sets.set(doc.uri, EMPTY);
    debug.store("ensure.created", { uri: doc.uri });
    return EMPTY;
  }

  /** Extend the set for `doc` by one diagnostic; returns the new full set. */
  append(doc: TextDocumentIdentifier, diagnostic: Diagnostic): DiagnosticSet {
    const current = this.ensure(doc);
    const next = Object.freeze([...current, diagnostic]);
    this.#sets.set(doc.uri, next);
    debug.store("append", { uri: doc.uri, count: next.length });
    return next;
  }

  get(uri: string): DiagnosticSet | undefined {
    return this.#sets.get(uri);
  }

  documents(): string[] {
    return [...this.#sets.keys()];
  }

  get size(): number {
    return this.#sets.size;
  }
}
