/**
 * JSON route report for a batch of analyzed routes.
 */

import type { AnalyzedRoute } from "../analysis/network-analysis.js";

export interface RouteReport {
  /** ISO-8601 timestamp */
  generatedAt: string;
  totalRoutes: number;
  routes: AnalyzedRoute[];
}

export function routeReportToJson(routes: AnalyzedRoute[], generatedAt: Date): RouteReport {
  return {
    generatedAt: generatedAt.toISOString(),
    totalRoutes: routes.length,
    routes,
  };
}
