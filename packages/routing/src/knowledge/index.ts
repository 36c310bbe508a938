export { KnowledgeBase } from "./knowledge-base.js";
export { haversineDistanceKm } from "./distance.js";
