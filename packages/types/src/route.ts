/**
 * Route results - the output of the inference engine.
 *
 * A route is the ordered list of station names from origin to destination,
 * the scalar cost the search minimized, and statistics for reporting.
 */

/** Aggregated statistics about a found route */
export interface RouteStatistics {
  /** Number of stations in the path, origin and destination included */
  stationCount: number;
  /** Number of hops whose endpoints sit on different lines */
  transferCount: number;
  /** Sum of connection distances in kilometers */
  totalDistance: number;
  /** Sum of connection times in minutes (informational, not optimized) */
  totalTime: number;
  /** Stations finalized by the search before it stopped */
  nodesExpanded: number;
  /** nodesExpanded divided by the number of stations in the network */
  efficiencyRatio: number;
}

/** Result of a successful route query */
export interface RouteResult {
  /** Station names from origin to destination */
  path: string[];
  /** distance + transferPenalty per transfer */
  totalCost: number;
  statistics: RouteStatistics;
}

/** Heuristic used to guide the search */
export type HeuristicMode =
  /** Great-circle distance to the destination */
  | "geographic"
  /** h = 0, uniform-cost search */
  | "none";

/** A station and the line it belongs to */
export interface StationRef {
  station: string;
  line: string;
}

/** One hop of an explained route */
export interface ExplainedSegment {
  /** 0-based hop index */
  index: number;
  from: string;
  to: string;
  fromLine: string;
  toLine: string;
  /** Null when the knowledge base no longer holds a connection for the hop */
  distanceKm: number | null;
  timeMinutes: number | null;
  /** True when the hop changes line */
  isTransfer: boolean;
}

/** A station along an explained route */
export interface ExplainedStop {
  /** 1-based position in the path */
  position: number;
  station: string;
  line: string;
  /** Line boarded when leaving this stop, if the next hop is a transfer */
  transferToLine?: string;
}

/** Structured explanation of a route, ready for a report writer */
export interface RouteExplanation {
  origin: StationRef | null;
  destination: StationRef | null;
  stops: ExplainedStop[];
  segments: ExplainedSegment[];
  /** Stations where the traveller changes line */
  transferPoints: string[];
  /** Lines ridden in travel order, one entry per stretch on the same line */
  linesUsed: string[];
  statistics: RouteStatistics;
}
