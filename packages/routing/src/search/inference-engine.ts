/**
 * A* inference engine over a KnowledgeBase.
 *
 * Cost model: every hop costs its connection distance, plus the transfer
 * penalty when the hop changes line. Travel time is summed alongside for
 * reporting but never orders the frontier.
 *
 * The heuristic is the great-circle distance from a station to the
 * destination. It ignores future transfer penalties, so it never
 * overestimates the remaining cost as long as no connection is shorter than
 * the straight line between its endpoints (see
 * `KnowledgeBase.validateConsistency`). Stations without coordinates get
 * h = 0, which degrades the search locally to uniform-cost.
 *
 * Frontier ties on f are broken by lower h (the entry closer to the
 * destination), then by push order.
 *
 * A connection whose far end is not a registered station is skipped. The
 * engine does no logging; callers report results as they see fit.
 */

import type {
  HeuristicMode,
  RouteExplanation,
  RouteResult,
  RouteStatistics,
} from "@linehop/types";
import { MissingCoordinatesError, RouteNotFoundError } from "../errors.js";
import type { KnowledgeBase } from "../knowledge/knowledge-base.js";
import { getDefaultRoutingParams, validateRoutingParams } from "../config/routing-config.js";
import { MinHeap } from "./min-heap.js";
import { explainRoute } from "./explain.js";

/** Options for the inference engine; missing fields take the routing defaults */
export interface InferenceEngineOptions {
  /** Cost added per line change, in kilometers */
  transferPenalty?: number;
  /** "none" turns the search into uniform-cost (h = 0) */
  heuristic?: HeuristicMode;
}

/** Per-station bookkeeping for a single query */
interface SearchState {
  /** Best known cost from the origin */
  g: number;
  /** Estimated remaining cost to the destination */
  h: number;
  /** Station this one was reached from on the best known path */
  previous: string | null;
  /** Transfers along the best known path */
  transfers: number;
  /** Distance along the best known path, without penalties */
  distance: number;
  /** Time along the best known path */
  time: number;
}

export class InferenceEngine {
  readonly knowledgeBase: KnowledgeBase;
  readonly transferPenalty: number;
  readonly heuristic: HeuristicMode;

  constructor(knowledgeBase: KnowledgeBase, options: InferenceEngineOptions = {}) {
    const defaults = getDefaultRoutingParams();
    const params = validateRoutingParams({
      transferPenalty: options.transferPenalty ?? defaults.transferPenalty,
      heuristic: options.heuristic ?? defaults.heuristic,
    });
    this.knowledgeBase = knowledgeBase;
    this.transferPenalty = params.transferPenalty;
    this.heuristic = params.heuristic;
  }

  /**
   * Find the lowest-cost route between two stations.
   *
   * @throws UnknownStationError if either station is not registered
   * @throws RouteNotFoundError if no path connects them
   */
  findOptimalRoute(origin: string, destination: string): RouteResult {
    const kb = this.knowledgeBase;
    kb.getStation(origin);
    kb.getStation(destination);

    if (origin === destination) {
      return {
        path: [origin],
        totalCost: 0,
        statistics: this.buildStatistics(1, 0, 0, 0, 1),
      };
    }

    const states = new Map<string, SearchState>();
    const closed = new Set<string>();
    const frontier = new MinHeap<{ station: string; g: number }>();

    const originH = this.estimate(origin, destination);
    states.set(origin, { g: 0, h: originH, previous: null, transfers: 0, distance: 0, time: 0 });
    frontier.push(originH, { station: origin, g: 0 }, originH);

    let nodesExpanded = 0;

    while (frontier.size > 0) {
      const entry = frontier.pop();
      if (!entry) break;
      const { station: current, g } = entry.value;

      // Lazy deletion: a better entry for this station was pushed later
      if (closed.has(current)) continue;
      const state = states.get(current);
      if (!state || state.g !== g) continue;

      closed.add(current);
      nodesExpanded++;

      if (current === destination) {
        const path = this.reconstructPath(states, destination);
        const statistics = this.buildStatistics(
          path.length,
          state.transfers,
          state.distance,
          state.time,
          nodesExpanded,
        );
        return { path, totalCost: state.g, statistics };
      }

      for (const neighbor of kb.neighborsOf(current)) {
        // Dangling connection: the far end is not a registered station
        if (closed.has(neighbor.station) || !kb.hasStation(neighbor.station)) continue;

        const transfer = kb.requiresTransfer(current, neighbor.station);
        const tentativeG = state.g + neighbor.distanceKm + (transfer ? this.transferPenalty : 0);
        const known = states.get(neighbor.station);
        if (known && tentativeG >= known.g) continue;

        const h = known ? known.h : this.estimate(neighbor.station, destination);
        states.set(neighbor.station, {
          g: tentativeG,
          h,
          previous: current,
          transfers: state.transfers + (transfer ? 1 : 0),
          distance: state.distance + neighbor.distanceKm,
          time: state.time + neighbor.timeMinutes,
        });
        frontier.push(tentativeG + h, { station: neighbor.station, g: tentativeG }, h);
      }
    }

    throw new RouteNotFoundError(origin, destination);
  }

  /**
   * Describe a route hop by hop, marking the hops that change line.
   *
   * @throws UnknownStationError if a station in the path is no longer registered
   */
  explainRoute(path: string[], statistics: RouteStatistics): RouteExplanation {
    return explainRoute(this.knowledgeBase, path, statistics);
  }

  private estimate(station: string, destination: string): number {
    if (this.heuristic === "none") return 0;
    try {
      return this.knowledgeBase.estimateHeuristic(station, destination);
    } catch (err) {
      if (err instanceof MissingCoordinatesError) return 0;
      throw err;
    }
  }

  private reconstructPath(states: Map<string, SearchState>, destination: string): string[] {
    const path: string[] = [];
    let current: string | null = destination;
    while (current !== null) {
      path.push(current);
      current = states.get(current)?.previous ?? null;
    }
    return path.reverse();
  }

  private buildStatistics(
    stationCount: number,
    transferCount: number,
    totalDistance: number,
    totalTime: number,
    nodesExpanded: number,
  ): RouteStatistics {
    const networkSize = this.knowledgeBase.stationCount;
    return {
      stationCount,
      transferCount,
      totalDistance,
      totalTime,
      nodesExpanded,
      efficiencyRatio: networkSize > 0 ? nodesExpanded / networkSize : 0,
    };
  }
}
