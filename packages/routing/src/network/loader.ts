/**
 * Network loading: JSON network description -> KnowledgeBase.
 *
 * The file format is validated with zod before anything is registered, so a
 * malformed file never leaves a half-built knowledge base behind. After
 * construction the consistency pass runs and its findings are returned with
 * the knowledge base (and logged) for the caller to act on.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

import type { ConsistencyViolation, NetworkDescription } from "@linehop/types";
import { NetworkLoadError } from "../errors.js";
import { KnowledgeBase } from "../knowledge/knowledge-base.js";
import { findRepoDir } from "../repo-paths.js";

const StationSchema = z.object({
  name: z.string().refine((s) => s.trim() !== "", "station name must not be empty"),
  line: z.string(),
  lat: z.number().min(-90).max(90).optional(),
  lng: z.number().min(-180).max(180).optional(),
});

const ConnectionSchema = z
  .object({
    from: z.string().min(1),
    to: z.string().min(1),
    distanceKm: z.number().finite().min(0, "distance must be >= 0"),
    timeMinutes: z.number().finite().min(0, "time must be >= 0"),
  })
  .refine((c) => c.from !== c.to, { message: "a station cannot connect to itself" });

export const NetworkDescriptionSchema = z
  .object({
    name: z.string(),
    stations: z.array(StationSchema),
    connections: z.array(ConnectionSchema),
  })
  .superRefine((network, ctx) => {
    const seen = new Set<string>();
    network.stations.forEach((station, i) => {
      if (seen.has(station.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["stations", i, "name"],
          message: `duplicate station "${station.name}"`,
        });
      }
      seen.add(station.name);
    });
  });

/** A knowledge base built from a network description */
export interface LoadedNetwork {
  name: string;
  knowledgeBase: KnowledgeBase;
  /** Findings of the consistency pass run after construction */
  violations: ConsistencyViolation[];
}

/**
 * Validate an already-parsed JSON value as a network description.
 *
 * @param source - Label for error messages (usually the file path)
 * @throws NetworkLoadError listing every schema issue
 */
export function parseNetwork(json: unknown, source: string): NetworkDescription {
  const result = NetworkDescriptionSchema.safeParse(json);
  if (!result.success) {
    throw new NetworkLoadError(
      source,
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  return result.data;
}

/** Populate a fresh knowledge base from a validated description. */
export function buildKnowledgeBase(network: NetworkDescription): LoadedNetwork {
  const kb = new KnowledgeBase();

  for (const station of network.stations) {
    kb.addStation(station.name, station.line, station.lat, station.lng);
  }
  for (const connection of network.connections) {
    kb.addConnection(connection.from, connection.to, connection.distanceKm, connection.timeMinutes);
  }

  const violations = kb.validateConsistency();
  console.log(
    `[network-loader] ${network.name}: ${kb.stationCount} stations, ${kb.connectionCount} connections, ${kb.lines().size} lines`,
  );
  for (const violation of violations) {
    console.warn(`[network-loader] ${violation.kind}: ${violation.message}`);
  }

  return { name: network.name, knowledgeBase: kb, violations };
}

/**
 * Read, validate and build a network JSON file.
 *
 * @throws NetworkLoadError if the file cannot be read, is not JSON, or fails validation
 */
export function loadNetworkFile(filePath: string): LoadedNetwork {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new NetworkLoadError(filePath, [err instanceof Error ? err.message : String(err)]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new NetworkLoadError(filePath, [`not valid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }

  return buildKnowledgeBase(parseNetwork(json, filePath));
}

// ---------------------------------------------------------------------------
// Bundled sample network
// ---------------------------------------------------------------------------

const SAMPLE_NETWORK_FILE = "riverton-metro.json";

/** `data/networks/` at the repository root */
export function findNetworksRoot(): string {
  return findRepoDir(["data", "networks"]);
}

/** Load the bundled sample network (Riverton Metro: 16 stations on 3 lines plus an interchange). */
export function loadSampleNetwork(): LoadedNetwork {
  return loadNetworkFile(join(findNetworksRoot(), SAMPLE_NETWORK_FILE));
}
