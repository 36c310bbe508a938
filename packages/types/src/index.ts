/**
 * @linehop/types
 *
 * Shared domain types for the transit route finder.
 *
 * - Network: stations, lines and connections
 * - Route: the result of a route query and its explanation
 */

export * from "./geo.js";
export * from "./network.js";
export * from "./route.js";
