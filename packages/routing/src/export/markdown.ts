/**
 * Markdown route report: one section per query with the station sequence
 * and trip statistics.
 */

import type { RouteResult, RouteStatistics } from "@linehop/types";
import { RouteNotFoundError } from "../errors.js";
import type { InferenceEngine } from "../search/inference-engine.js";

export interface RouteQuery {
  origin: string;
  destination: string;
}

function statisticsLines(statistics: RouteStatistics): string[] {
  return [
    `- Stations: ${statistics.stationCount}`,
    `- Transfers: ${statistics.transferCount}`,
    `- Distance: ${statistics.totalDistance.toFixed(2)} km`,
    `- Estimated time: ${statistics.totalTime.toFixed(1)} minutes`,
    `- Nodes expanded: ${statistics.nodesExpanded}`,
  ];
}

/**
 * Run each query and render the results as Markdown.
 *
 * Disconnected pairs get a "No valid route found" section; any other error
 * propagates.
 */
export function routesToMarkdown(engine: InferenceEngine, queries: RouteQuery[], generatedAt: Date): string {
  const kb = engine.knowledgeBase;
  const lines: string[] = [
    "# Route Report",
    "",
    `**Generated:** ${generatedAt.toISOString()}`,
    "",
    `**Network:** ${kb.stationCount} stations, ${kb.connectionCount} connections`,
    "",
    "---",
    "",
  ];

  for (const { origin, destination } of queries) {
    lines.push(`## Route: ${origin} → ${destination}`, "");

    let result: RouteResult;
    try {
      result = engine.findOptimalRoute(origin, destination);
    } catch (err) {
      if (!(err instanceof RouteNotFoundError)) throw err;
      lines.push("**No valid route found**", "", "---", "");
      continue;
    }

    lines.push("### Station Sequence", "");
    result.path.forEach((name, i) => {
      lines.push(`${i + 1}. **${name}** (Line: ${kb.getStation(name).line})`);
    });
    lines.push("", "### Statistics", "", ...statisticsLines(result.statistics), "", "---", "");
  }

  return lines.join("\n");
}
