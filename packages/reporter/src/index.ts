export * from "./problem.js";
export * from "./reporter.js";
export * from "./client.js";
export * from "./config.js";
export * from "./logger.js";
export { debug, configureDebug, refreshDebugChannels, isDebugEnabled, DEBUG_ENV, type DebugConfig } from "./debug.js";
export { toProtocolRange } from "./mapping/position.js";
export { toDiagnostic, toProtocolSeverity, DIAGNOSTIC_SOURCE } from "./mapping/diagnostic.js";
export { fileDocument, problemDocument } from "./mapping/document.js";
export { DiagnosticStore, type DiagnosticSet } from "./services/diagnostic-store.js";
export { ProblemCounters, type ProblemCounts } from "./services/counters.js";
export { OnceFlag } from "./services/once-flag.js";
