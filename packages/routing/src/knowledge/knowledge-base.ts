/**
 * Knowledge base for a transit network.
 *
 * Holds the stations (keyed by name) and an undirected adjacency index of
 * connections. It answers the three questions the inference engine asks
 * while searching:
 *
 * - which stations can be reached from here, and at what distance/time
 * - does moving between two adjacent stations mean changing line
 * - how far, at least, is one station from another (the A* heuristic)
 *
 * Connections may reference stations that are registered later, so the
 * network can be built in any order. `validateConsistency` reports whatever
 * is still dangling once construction is done.
 */

import type {
  Connection,
  ConnectionWeights,
  ConsistencyViolation,
  Neighbor,
  Station,
} from "@linehop/types";
import {
  InvalidConnectionError,
  InvalidStationError,
  MissingCoordinatesError,
  UnknownStationError,
} from "../errors.js";
import { haversineDistanceKm } from "./distance.js";

/** Slack allowed when comparing straight-line distance to a connection */
const HEURISTIC_TOLERANCE_KM = 1e-9;

function pairKey(a: string, b: string): string {
  return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

export class KnowledgeBase {
  private readonly stationsByName = new Map<string, Station>();
  /** Unordered pairs in the order they were first registered */
  private readonly pairs = new Map<string, [string, string]>();
  /** station -> neighbour -> weights, written in both directions */
  protected readonly adjacency = new Map<string, Map<string, ConnectionWeights>>();

  /**
   * Register a station, or overwrite the line and coordinates of an existing
   * one. Coordinates are kept only when both are finite numbers.
   */
  addStation(name: string, line: string, lat?: number, lng?: number): Station {
    if (name.trim() === "") {
      throw new InvalidStationError(name, "name must not be empty");
    }

    const station: Station = { name, line };
    if (lat !== undefined && lng !== undefined && Number.isFinite(lat) && Number.isFinite(lng)) {
      station.coordinate = { lat, lng };
    }
    this.stationsByName.set(name, station);
    return station;
  }

  /**
   * Register a bidirectional connection. Re-registering a pair (in either
   * direction) replaces its weights.
   *
   * @throws InvalidConnectionError for a negative or non-finite weight, or a
   *   self-loop. The knowledge base is left untouched.
   */
  addConnection(from: string, to: string, distanceKm: number, timeMinutes: number): void {
    if (from === to) {
      throw new InvalidConnectionError(from, to, "a station cannot connect to itself");
    }
    if (!Number.isFinite(distanceKm) || !Number.isFinite(timeMinutes)) {
      throw new InvalidConnectionError(from, to, "distance and time must be finite numbers");
    }
    if (distanceKm < 0) {
      throw new InvalidConnectionError(from, to, `distance must be >= 0 (got ${distanceKm})`);
    }
    if (timeMinutes < 0) {
      throw new InvalidConnectionError(from, to, `time must be >= 0 (got ${timeMinutes})`);
    }

    this.link(from, to, { distanceKm, timeMinutes });
    this.link(to, from, { distanceKm, timeMinutes });

    const key = pairKey(from, to);
    if (!this.pairs.has(key)) {
      this.pairs.set(key, [from, to]);
    }
  }

  private link(from: string, to: string, weights: ConnectionWeights): void {
    let neighbors = this.adjacency.get(from);
    if (!neighbors) {
      neighbors = new Map();
      this.adjacency.set(from, neighbors);
    }
    neighbors.set(to, { ...weights });
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  hasStation(name: string): boolean {
    return this.stationsByName.has(name);
  }

  /** @throws UnknownStationError */
  getStation(name: string): Station {
    const station = this.stationsByName.get(name);
    if (!station) {
      throw new UnknownStationError(name);
    }
    return station;
  }

  /** Registered stations in registration order */
  stations(): IterableIterator<Station> {
    return this.stationsByName.values();
  }

  get stationCount(): number {
    return this.stationsByName.size;
  }

  /** Number of distinct unordered station pairs with a connection */
  get connectionCount(): number {
    return this.pairs.size;
  }

  /** Each connection once, oriented as first registered */
  connections(): Connection[] {
    const result: Connection[] = [];
    for (const [from, to] of this.pairs.values()) {
      const weights = this.adjacency.get(from)?.get(to);
      if (weights) {
        result.push({ from, to, ...weights });
      }
    }
    return result;
  }

  /** Line label -> station names on that line, in registration order */
  lines(): Map<string, string[]> {
    const byLine = new Map<string, string[]>();
    for (const station of this.stationsByName.values()) {
      const members = byLine.get(station.line);
      if (members) {
        members.push(station.name);
      } else {
        byLine.set(station.line, [station.name]);
      }
    }
    return byLine;
  }

  /**
   * Stations reachable over one connection.
   *
   * @throws UnknownStationError if `station` is not registered
   */
  neighborsOf(station: string): Neighbor[] {
    this.getStation(station);
    const neighbors = this.adjacency.get(station);
    if (!neighbors) return [];
    return [...neighbors].map(([name, weights]) => ({ station: name, ...weights }));
  }

  /** Weights of the connection between two stations, if one is registered */
  connectionBetween(from: string, to: string): ConnectionWeights | undefined {
    const weights = this.adjacency.get(from)?.get(to);
    return weights ? { ...weights } : undefined;
  }

  /**
   * True when the two stations are on different lines.
   *
   * @throws UnknownStationError if either station is not registered
   */
  requiresTransfer(a: string, b: string): boolean {
    return this.getStation(a).line !== this.getStation(b).line;
  }

  /**
   * Straight-line (great-circle) distance in kilometers, a lower bound on
   * the distance travelled between the two stations.
   *
   * @throws UnknownStationError if either station is not registered
   * @throws MissingCoordinatesError if either station has no coordinates
   */
  estimateHeuristic(a: string, b: string): number {
    const from = this.getStation(a);
    const to = this.getStation(b);
    if (!from.coordinate) throw new MissingCoordinatesError(a);
    if (!to.coordinate) throw new MissingCoordinatesError(b);
    return haversineDistanceKm(from.coordinate, to.coordinate);
  }

  // -------------------------------------------------------------------------
  // Validation
  // -------------------------------------------------------------------------

  /**
   * Scan every connection and report problems. Never throws; an empty list
   * means the network is consistent.
   *
   * Besides dangling references, bad weights and asymmetric entries, this
   * flags connections shorter than the straight line between their
   * endpoints: on such an edge the geographic heuristic overestimates and
   * the search may miss the cheapest route.
   */
  validateConsistency(): ConsistencyViolation[] {
    const violations: ConsistencyViolation[] = [];
    const reportedUnknown = new Set<string>();
    const checkedPairs = new Set<string>();

    const reportUnknown = (name: string, referencedFrom: string): void => {
      if (this.stationsByName.has(name) || reportedUnknown.has(name)) return;
      reportedUnknown.add(name);
      violations.push({
        kind: "unknown-station",
        stations: [name, referencedFrom],
        message: `Connection references unregistered station "${name}" (from "${referencedFrom}")`,
      });
    };

    for (const [from, neighbors] of this.adjacency) {
      for (const [to, weights] of neighbors) {
        reportUnknown(from, to);
        reportUnknown(to, from);

        const reverse = this.adjacency.get(to)?.get(from);
        if (!reverse) {
          violations.push({
            kind: "asymmetric-connection",
            stations: [from, to],
            message: `${from} -> ${to} exists but ${to} -> ${from} does not`,
          });
        } else if (
          reverse.distanceKm !== weights.distanceKm ||
          reverse.timeMinutes !== weights.timeMinutes
        ) {
          // Reported once per pair, from whichever side is scanned first
          const key = pairKey(from, to);
          if (!checkedPairs.has(`asym:${key}`)) {
            checkedPairs.add(`asym:${key}`);
            violations.push({
              kind: "asymmetric-connection",
              stations: [from, to],
              message:
                `${from} -> ${to} (${weights.distanceKm} km, ${weights.timeMinutes} min) differs from ` +
                `${to} -> ${from} (${reverse.distanceKm} km, ${reverse.timeMinutes} min)`,
            });
          }
        }

        const key = pairKey(from, to);
        if (checkedPairs.has(key)) continue;
        checkedPairs.add(key);

        violations.push(...this.checkWeights(from, to, weights));
      }
    }

    return violations;
  }

  private checkWeights(from: string, to: string, weights: ConnectionWeights): ConsistencyViolation[] {
    const found: ConsistencyViolation[] = [];
    const { distanceKm, timeMinutes } = weights;

    if (!Number.isFinite(distanceKm) || !Number.isFinite(timeMinutes)) {
      found.push({
        kind: "non-finite-weight",
        stations: [from, to],
        message: `${from} -> ${to} has a non-finite weight (${distanceKm} km, ${timeMinutes} min)`,
      });
      return found;
    }
    if (distanceKm < 0) {
      found.push({
        kind: "negative-weight",
        stations: [from, to],
        message: `${from} -> ${to} has negative distance ${distanceKm} km`,
      });
    }
    if (timeMinutes < 0) {
      found.push({
        kind: "negative-weight",
        stations: [from, to],
        message: `${from} -> ${to} has negative time ${timeMinutes} min`,
      });
    }

    const a = this.stationsByName.get(from)?.coordinate;
    const b = this.stationsByName.get(to)?.coordinate;
    if (a && b) {
      const straightLine = haversineDistanceKm(a, b);
      if (straightLine > distanceKm + HEURISTIC_TOLERANCE_KM) {
        found.push({
          kind: "heuristic-overestimate",
          stations: [from, to],
          message:
            `${from} -> ${to} is ${distanceKm} km but its endpoints are ` +
            `${straightLine.toFixed(3)} km apart in a straight line`,
        });
      }
    }

    return found;
  }
}
