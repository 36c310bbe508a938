import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomBytes } from "node:crypto";

import {
  getDefaultRoutingParams,
  listRoutingProfiles,
  loadBaseRoutingConfig,
  loadRoutingProfile,
  mergeRoutingParams,
  validateRoutingParams,
} from "./routing-config.js";
import { InvalidConfigError } from "../errors.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

let root: string;

function writeJson(relativePath: string, value: unknown): void {
  const filePath = join(root, relativePath);
  mkdirSync(join(filePath, ".."), { recursive: true });
  writeFileSync(filePath, JSON.stringify(value));
}

beforeEach(() => {
  root = join(tmpdir(), `linehop-config-${randomBytes(6).toString("hex")}`);
  mkdirSync(root, { recursive: true });
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
  vi.restoreAllMocks();
});

// ─── Defaults and merging ───────────────────────────────────────────────────

describe("getDefaultRoutingParams", () => {
  it("returns a fresh copy each time", () => {
    const a = getDefaultRoutingParams();
    a.transferPenalty = 99;
    expect(getDefaultRoutingParams()).toEqual({ transferPenalty: 2, heuristic: "geographic" });
  });
});

describe("mergeRoutingParams", () => {
  it("overrides only the given fields", () => {
    const base = getDefaultRoutingParams();
    expect(mergeRoutingParams(base, { heuristic: "none" })).toEqual({ transferPenalty: 2, heuristic: "none" });
    expect(mergeRoutingParams(base, { transferPenalty: 0 })).toEqual({ transferPenalty: 0, heuristic: "geographic" });
    expect(mergeRoutingParams(base, {})).toEqual(base);
  });
});

describe("validateRoutingParams", () => {
  it("names the offending field", () => {
    try {
      validateRoutingParams({ transferPenalty: -0.1, heuristic: "geographic" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      if (err instanceof InvalidConfigError) {
        expect(err.field).toBe("transferPenalty");
      }
    }
  });
});

// ─── Loading ────────────────────────────────────────────────────────────────

describe("loadBaseRoutingConfig", () => {
  it("falls back to defaults when base.json is absent", () => {
    expect(loadBaseRoutingConfig(root)).toEqual({ transferPenalty: 2, heuristic: "geographic" });
  });

  it("reads base.json", () => {
    writeJson("base.json", { transferPenalty: 3.5, heuristic: "none" });
    expect(loadBaseRoutingConfig(root)).toEqual({ transferPenalty: 3.5, heuristic: "none" });
  });

  it("rejects out-of-range values", () => {
    writeJson("base.json", { transferPenalty: -1, heuristic: "geographic" });
    expect(() => loadBaseRoutingConfig(root)).toThrow(InvalidConfigError);
  });

  it("rejects unknown heuristics and unknown keys", () => {
    writeJson("base.json", { transferPenalty: 1, heuristic: "manhattan" });
    expect(() => loadBaseRoutingConfig(root)).toThrow(InvalidConfigError);

    writeJson("base.json", { transferPenalty: 1, heuristic: "none", walkingSpeed: 5 });
    expect(() => loadBaseRoutingConfig(root)).toThrow(InvalidConfigError);
  });

  it("rejects a file that is not JSON", () => {
    writeFileSync(join(root, "base.json"), "{ transferPenalty: ");
    expect(() => loadBaseRoutingConfig(root)).toThrow(/cannot read/);
  });

  it("finds the repository configs by default", () => {
    expect(loadBaseRoutingConfig()).toEqual({ transferPenalty: 2, heuristic: "geographic" });
  });
});

describe("loadRoutingProfile", () => {
  it("merges profile overrides on top of the base", () => {
    writeJson("base.json", { transferPenalty: 1, heuristic: "geographic" });
    writeJson("profiles/slow.json", {
      name: "slow",
      description: "test profile",
      overrides: { heuristic: "none" },
    });

    expect(loadRoutingProfile("slow", root)).toEqual({
      transferPenalty: 1,
      heuristic: "none",
      _profile: { name: "slow", description: "test profile" },
    });
  });

  it("throws for a missing profile", () => {
    expect(() => loadRoutingProfile("nope", root)).toThrow(InvalidConfigError);
  });

  it("loads the bundled transfer-averse profile", () => {
    const params = loadRoutingProfile("transfer-averse");
    expect(params.transferPenalty).toBe(6);
    expect(params.heuristic).toBe("geographic");
    expect(params._profile.name).toBe("transfer-averse");
  });
});

describe("listRoutingProfiles", () => {
  it("returns an empty list without a profiles directory", () => {
    expect(listRoutingProfiles(root)).toEqual([]);
  });

  it("skips malformed profiles with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    writeJson("profiles/a.json", { name: "a", description: "first", overrides: {} });
    writeJson("profiles/b.json", { name: "b", overrides: { transferPenalty: "high" } });

    expect(listRoutingProfiles(root)).toEqual([{ name: "a", description: "first" }]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("lists the bundled profiles in file order", () => {
    expect(listRoutingProfiles().map((p) => p.name)).toEqual([
      "shortest-distance",
      "transfer-averse",
      "uniform-cost",
    ]);
  });
});
