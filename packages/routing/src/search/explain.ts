/**
 * Route explanation: turns a path of station names into structured stops
 * and hops, with line changes marked. Pure function of the path and the
 * knowledge base; no search happens here.
 */

import type {
  ExplainedSegment,
  ExplainedStop,
  RouteExplanation,
  RouteStatistics,
} from "@linehop/types";
import type { KnowledgeBase } from "../knowledge/knowledge-base.js";

/**
 * @throws UnknownStationError if a station in the path is not registered
 */
export function explainRoute(
  kb: KnowledgeBase,
  path: string[],
  statistics: RouteStatistics,
): RouteExplanation {
  const stations = path.map((name) => kb.getStation(name));

  const segments: ExplainedSegment[] = [];
  for (let i = 0; i + 1 < stations.length; i++) {
    const from = stations[i];
    const to = stations[i + 1];
    if (!from || !to) continue;
    const weights = kb.connectionBetween(from.name, to.name);
    segments.push({
      index: i,
      from: from.name,
      to: to.name,
      fromLine: from.line,
      toLine: to.line,
      distanceKm: weights?.distanceKm ?? null,
      timeMinutes: weights?.timeMinutes ?? null,
      isTransfer: from.line !== to.line,
    });
  }

  const stops: ExplainedStop[] = stations.map((station, i) => {
    const stop: ExplainedStop = { position: i + 1, station: station.name, line: station.line };
    const next = segments[i];
    if (next?.isTransfer) {
      stop.transferToLine = next.toLine;
    }
    return stop;
  });

  const linesUsed: string[] = [];
  for (const station of stations) {
    if (linesUsed[linesUsed.length - 1] !== station.line) {
      linesUsed.push(station.line);
    }
  }

  const first = stations[0];
  const last = stations[stations.length - 1];

  return {
    origin: first ? { station: first.name, line: first.line } : null,
    destination: last ? { station: last.name, line: last.line } : null,
    stops,
    segments,
    transferPoints: segments.filter((s) => s.isTransfer).map((s) => s.from),
    linesUsed,
    statistics,
  };
}
