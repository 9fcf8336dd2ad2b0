import type { ProblemSeverity } from "../problem.js";

export interface ProblemCounts {
  readonly errors: number;
  readonly warnings: number;
  readonly infos: number;
}

/** Per-severity problem counters. Only ever increase. */
export class ProblemCounters {
  #errors = 0;
  #warnings = 0;
  #infos = 0;

  increment(severity: ProblemSeverity): void {
    switch (severity) {
      case "error":
        this.#errors += 1;
        return;
      case "warning":
        this.#warnings += 1;
        return;
      case "info":
        this.#infos += 1;
        return;
    }
  }

  get errors(): number {
    return this.#errors;
  }

  get warnings(): number {
    return this.#warnings;
  }

  get infos(): number {
    return this.#infos;
  }

  snapshot(): ProblemCounts {
    return { errors: this.#errors, warnings: this.#warnings, infos: this.#infos };
  }
}
