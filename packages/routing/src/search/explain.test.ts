import { describe, it, expect } from "vitest";
import type { RouteStatistics } from "@linehop/types";
import { explainRoute } from "./explain.js";
import { InferenceEngine } from "./inference-engine.js";
import { KnowledgeBase } from "../knowledge/knowledge-base.js";
import { UnknownStationError } from "../errors.js";

function makeLineNetwork(): KnowledgeBase {
  const kb = new KnowledgeBase();
  kb.addStation("P", "1", 0, 0);
  kb.addStation("Q", "1", 0, 1);
  kb.addStation("R", "2", 0, 2);
  kb.addConnection("P", "Q", 1, 2);
  kb.addConnection("Q", "R", 1, 2);
  return kb;
}

const EMPTY_STATS: RouteStatistics = {
  stationCount: 0,
  transferCount: 0,
  totalDistance: 0,
  totalTime: 0,
  nodesExpanded: 0,
  efficiencyRatio: 0,
};

describe("explainRoute", () => {
  it("marks the hop that changes line", () => {
    const engine = new InferenceEngine(makeLineNetwork());
    const { path, statistics } = engine.findOptimalRoute("P", "R");
    const explanation = engine.explainRoute(path, statistics);

    expect(explanation.origin).toEqual({ station: "P", line: "1" });
    expect(explanation.destination).toEqual({ station: "R", line: "2" });
    expect(explanation.segments).toEqual([
      { index: 0, from: "P", to: "Q", fromLine: "1", toLine: "1", distanceKm: 1, timeMinutes: 2, isTransfer: false },
      { index: 1, from: "Q", to: "R", fromLine: "1", toLine: "2", distanceKm: 1, timeMinutes: 2, isTransfer: true },
    ]);
    expect(explanation.stops).toEqual([
      { position: 1, station: "P", line: "1" },
      { position: 2, station: "Q", line: "1", transferToLine: "2" },
      { position: 3, station: "R", line: "2" },
    ]);
    expect(explanation.transferPoints).toEqual(["Q"]);
    expect(explanation.linesUsed).toEqual(["1", "2"]);
    expect(explanation.statistics).toBe(statistics);
  });

  it("explains a single-station route without segments", () => {
    const explanation = explainRoute(makeLineNetwork(), ["Q"], EMPTY_STATS);
    expect(explanation.origin).toEqual({ station: "Q", line: "1" });
    expect(explanation.destination).toEqual({ station: "Q", line: "1" });
    expect(explanation.segments).toEqual([]);
    expect(explanation.stops).toEqual([{ position: 1, station: "Q", line: "1" }]);
    expect(explanation.linesUsed).toEqual(["1"]);
  });

  it("returns an empty explanation for an empty path", () => {
    const explanation = explainRoute(makeLineNetwork(), [], EMPTY_STATS);
    expect(explanation.origin).toBeNull();
    expect(explanation.destination).toBeNull();
    expect(explanation.stops).toEqual([]);
    expect(explanation.segments).toEqual([]);
    expect(explanation.transferPoints).toEqual([]);
  });

  it("leaves weights null for a hop without a registered connection", () => {
    const explanation = explainRoute(makeLineNetwork(), ["P", "R"], EMPTY_STATS);
    expect(explanation.segments[0]).toMatchObject({ distanceKm: null, timeMinutes: null, isTransfer: true });
  });

  it("records each stretch when a route returns to an earlier line", () => {
    const kb = makeLineNetwork();
    kb.addStation("T", "1", 0, 3);
    kb.addConnection("R", "T", 1, 2);
    const explanation = explainRoute(kb, ["P", "Q", "R", "T"], EMPTY_STATS);
    expect(explanation.linesUsed).toEqual(["1", "2", "1"]);
    expect(explanation.transferPoints).toEqual(["Q", "R"]);
  });

  it("throws when a station in the path does not resolve", () => {
    expect(() => explainRoute(makeLineNetwork(), ["P", "Gone"], EMPTY_STATS)).toThrow(UnknownStationError);
  });
});
