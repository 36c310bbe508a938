/**
 * Informed versus uninformed search on the same query.
 *
 * Both runs share the cost model; only the heuristic differs. With an
 * admissible heuristic the two costs agree and A* expands no more stations
 * than uniform-cost search.
 */

import type { RouteResult } from "@linehop/types";
import type { KnowledgeBase } from "../knowledge/knowledge-base.js";
import { InferenceEngine } from "../search/inference-engine.js";

const COST_EPSILON = 1e-9;

export interface StrategyComparison {
  /** A* with the geographic heuristic */
  informed: RouteResult;
  /** Uniform-cost search (h = 0) */
  uninformed: RouteResult;
  /** uninformed.nodesExpanded - informed.nodesExpanded */
  nodesSaved: number;
  /** nodesSaved as a percentage of the uninformed expansions */
  savingsPercent: number;
  /** True when both searches report the same cost */
  costsAgree: boolean;
}

/**
 * @throws UnknownStationError if either station is not registered
 * @throws RouteNotFoundError if the stations are not connected
 */
export function compareSearchStrategies(
  kb: KnowledgeBase,
  origin: string,
  destination: string,
  transferPenalty?: number,
): StrategyComparison {
  const informed = new InferenceEngine(kb, { transferPenalty, heuristic: "geographic" })
    .findOptimalRoute(origin, destination);
  const uninformed = new InferenceEngine(kb, { transferPenalty, heuristic: "none" })
    .findOptimalRoute(origin, destination);

  const nodesSaved = uninformed.statistics.nodesExpanded - informed.statistics.nodesExpanded;

  return {
    informed,
    uninformed,
    nodesSaved,
    savingsPercent: (nodesSaved / uninformed.statistics.nodesExpanded) * 100,
    costsAgree: Math.abs(informed.totalCost - uninformed.totalCost) <= COST_EPSILON,
  };
}
