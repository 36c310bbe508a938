/**
 * Transit network representation.
 *
 * Stations are the nodes, keyed by their unique name. Connections are
 * undirected weighted edges: one distance/time pair per unordered station
 * pair, traversable in both directions.
 */

import type { Coordinate } from "./geo.js";

/** A station registered in the knowledge base */
export interface Station {
  /** Unique name, the station's identity */
  name: string;
  /** Line label; two adjacent stations on different lines imply a transfer */
  line: string;
  /** Absent when the source data has no position for the station */
  coordinate?: Coordinate;
}

/** Weights carried by a connection, identical in both directions */
export interface ConnectionWeights {
  /** Physical distance in kilometers */
  distanceKm: number;
  /** Nominal travel time in minutes */
  timeMinutes: number;
}

/** A direct link between two stations */
export interface Connection extends ConnectionWeights {
  from: string;
  to: string;
}

/** A station reachable over one connection, as seen from its neighbour */
export interface Neighbor extends ConnectionWeights {
  station: string;
}

/** Kinds of problem the consistency pass can report */
export type ConsistencyViolationKind =
  | "unknown-station"
  | "negative-weight"
  | "non-finite-weight"
  | "asymmetric-connection"
  | "heuristic-overestimate";

/** A single finding from `validateConsistency` */
export interface ConsistencyViolation {
  kind: ConsistencyViolationKind;
  /** Stations involved, in the direction the problem was found */
  stations: string[];
  message: string;
}

/**
 * Serialized network description, as read from a JSON network file.
 * Coordinates are flat so the files stay easy to write by hand.
 */
export interface NetworkDescription {
  name: string;
  stations: {
    name: string;
    line: string;
    lat?: number;
    lng?: number;
  }[];
  connections: Connection[];
}
