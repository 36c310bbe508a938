/**
 * Plain-text renderings: a single explained route, and the whole network
 * grouped by line.
 */

import type { RouteExplanation } from "@linehop/types";
import type { KnowledgeBase } from "../knowledge/knowledge-base.js";

export function explanationToText(explanation: RouteExplanation): string {
  const { origin, destination, stops, statistics } = explanation;
  if (!origin || !destination) {
    return "No valid route between the requested stations.";
  }

  const lines: string[] = [
    `Origin: ${origin.station} (${origin.line})`,
    `Destination: ${destination.station} (${destination.line})`,
    "",
    "Stations:",
  ];
  for (const stop of stops) {
    const transfer = stop.transferToLine !== undefined ? ` → transfer to ${stop.transferToLine}` : "";
    lines.push(`  ${stop.position}. ${stop.station} [${stop.line}]${transfer}`);
  }
  lines.push(
    "",
    `Stations: ${statistics.stationCount}`,
    `Transfers: ${statistics.transferCount}`,
    `Distance: ${statistics.totalDistance.toFixed(2)} km`,
    `Time: ${statistics.totalTime.toFixed(1)} min`,
    `Nodes expanded: ${statistics.nodesExpanded}`,
  );
  return lines.join("\n");
}

/** Stations grouped by line (sorted by line label), each with its connections. */
export function networkToText(kb: KnowledgeBase): string {
  const byLine = kb.lines();
  const lines: string[] = ["TRANSIT NETWORK", ""];

  for (const line of [...byLine.keys()].sort()) {
    lines.push(line, "-".repeat(line.length));
    for (const name of byLine.get(line) ?? []) {
      lines.push(`${name}:`);
      const neighbors = kb.neighborsOf(name);
      if (neighbors.length === 0) {
        lines.push("  (no connections)");
      }
      for (const neighbor of neighbors) {
        const transfer =
          kb.hasStation(neighbor.station) && kb.requiresTransfer(name, neighbor.station) ? " [TRANSFER]" : "";
        lines.push(
          `  → ${neighbor.station}${transfer} (${neighbor.distanceKm.toFixed(1)} km, ${neighbor.timeMinutes} min)`,
        );
      }
    }
    lines.push("");
  }

  lines.push(
    `Stations: ${kb.stationCount}`,
    `Connections: ${kb.connectionCount}`,
    `Lines: ${byLine.size}`,
  );
  return lines.join("\n");
}
