/**
 * All-pairs route analysis over a station sample.
 *
 * Runs the engine for every ordered (origin, destination) pair and
 * aggregates the results: how many pairs are connected, average route
 * shape, and the extreme cases worth a closer look.
 */

import type { RouteResult } from "@linehop/types";
import { RouteNotFoundError } from "../errors.js";
import type { InferenceEngine } from "../search/inference-engine.js";

export interface AnalyzedRoute extends RouteResult {
  origin: string;
  destination: string;
}

export interface AnalysisSummary {
  averagePathLength: number;
  maxPathLength: number;
  minPathLength: number;
  averageTransfers: number;
  averageDistance: number;
  averageTime: number;
  averageNodesExpanded: number;
}

export interface AnalysisExtremes {
  /** Most stations */
  longest: AnalyzedRoute;
  mostTransfers: AnalyzedRoute;
  /** Least total time */
  fastest: AnalyzedRoute;
  /** Fewest nodes expanded */
  mostEfficient: AnalyzedRoute;
}

export interface NetworkAnalysis {
  totalQueries: number;
  routesFound: number;
  /** routesFound / totalQueries, 0 when nothing was queried */
  successRate: number;
  routes: AnalyzedRoute[];
  unreachable: { origin: string; destination: string }[];
  /** Null when no route was found */
  summary: AnalysisSummary | null;
  extremes: AnalysisExtremes | null;
}

function average(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** First route with the highest value; ties keep query order. */
function pickBy(routes: AnalyzedRoute[], value: (r: AnalyzedRoute) => number, highest: boolean): AnalyzedRoute | undefined {
  let best: AnalyzedRoute | undefined;
  for (const route of routes) {
    if (!best) {
      best = route;
      continue;
    }
    const v = value(route);
    const b = value(best);
    if (highest ? v > b : v < b) best = route;
  }
  return best;
}

/**
 * Analyze routes between every ordered pair of distinct stations in the sample.
 *
 * @param sample - Station names to pair up; defaults to every station in
 *   registration order
 * @throws UnknownStationError if a sampled station is not registered
 */
export function analyzeNetwork(engine: InferenceEngine, sample?: string[]): NetworkAnalysis {
  const stations = sample ?? [...engine.knowledgeBase.stations()].map((s) => s.name);

  const routes: AnalyzedRoute[] = [];
  const unreachable: { origin: string; destination: string }[] = [];
  let totalQueries = 0;

  for (const origin of stations) {
    for (const destination of stations) {
      if (origin === destination) continue;
      totalQueries++;
      try {
        routes.push({ origin, destination, ...engine.findOptimalRoute(origin, destination) });
      } catch (err) {
        if (!(err instanceof RouteNotFoundError)) throw err;
        unreachable.push({ origin, destination });
      }
    }
  }

  console.log(
    `[analysis] ${totalQueries} queries over ${stations.length} stations, ${routes.length} routes found`,
  );

  const longest = pickBy(routes, (r) => r.statistics.stationCount, true);
  const mostTransfers = pickBy(routes, (r) => r.statistics.transferCount, true);
  const fastest = pickBy(routes, (r) => r.statistics.totalTime, false);
  const mostEfficient = pickBy(routes, (r) => r.statistics.nodesExpanded, false);

  const lengths = routes.map((r) => r.statistics.stationCount);

  return {
    totalQueries,
    routesFound: routes.length,
    successRate: totalQueries > 0 ? routes.length / totalQueries : 0,
    routes,
    unreachable,
    summary:
      routes.length > 0
        ? {
            averagePathLength: average(lengths),
            maxPathLength: Math.max(...lengths),
            minPathLength: Math.min(...lengths),
            averageTransfers: average(routes.map((r) => r.statistics.transferCount)),
            averageDistance: average(routes.map((r) => r.statistics.totalDistance)),
            averageTime: average(routes.map((r) => r.statistics.totalTime)),
            averageNodesExpanded: average(routes.map((r) => r.statistics.nodesExpanded)),
          }
        : null,
    extremes:
      longest && mostTransfers && fastest && mostEfficient
        ? { longest, mostTransfers, fastest, mostEfficient }
        : null,
  };
}
