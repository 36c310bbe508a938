/**
 * Route search module.
 *
 * A* over the knowledge base, with route explanation for report writers.
 */

export { InferenceEngine, type InferenceEngineOptions } from "./inference-engine.js";
export { explainRoute } from "./explain.js";
export { MinHeap } from "./min-heap.js";
