/**
 * @linehop/routing
 *
 * Transit route finding over a knowledge base of stations and lines.
 *
 * Key concepts:
 * - KnowledgeBase: stations, connections, the transfer rule and the heuristic
 * - InferenceEngine: A* search with transfer penalties and route explanation
 * - Network loader: JSON network files -> KnowledgeBase
 * - Analysis and export: batch statistics and reports for callers
 *
 * Pipeline:
 * 1. Load or build a KnowledgeBase
 * 2. Check it with validateConsistency()
 * 3. Query routes through an InferenceEngine bound to it
 * 4. Explain / export the results
 */

export * from "./errors.js";
export * from "./knowledge/index.js";
export * from "./search/index.js";
export * from "./config/index.js";
export * from "./network/index.js";
export * from "./analysis/index.js";
export * from "./export/index.js";
export * from "./cli/index.js";
