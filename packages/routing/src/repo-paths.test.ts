import { describe, it, expect, afterEach } from "vitest";
import { existsSync, mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomBytes } from "node:crypto";

import { findRepoDir } from "./repo-paths.js";
import { findConfigsRoot } from "./config/routing-config.js";
import { findNetworksRoot } from "./network/loader.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe("findRepoDir", () => {
  it("finds the nearest ancestor holding the directory", () => {
    const root = join(tmpdir(), `linehop-paths-${randomBytes(6).toString("hex")}`);
    tempDirs.push(root);
    const start = join(root, "packages", "routing", "src");
    mkdirSync(start, { recursive: true });
    mkdirSync(join(root, "configs", "routing"), { recursive: true });

    expect(findRepoDir(["configs", "routing"], start)).toBe(join(root, "configs", "routing"));
  });

  it("prefers a closer match over one further up", () => {
    const root = join(tmpdir(), `linehop-paths-${randomBytes(6).toString("hex")}`);
    tempDirs.push(root);
    const start = join(root, "packages", "routing");
    mkdirSync(join(start, "data", "networks"), { recursive: true });
    mkdirSync(join(root, "data", "networks"), { recursive: true });

    expect(findRepoDir(["data", "networks"], start)).toBe(join(start, "data", "networks"));
  });

  it("falls back to a path under the repository root", () => {
    const result = findRepoDir(["no-such-linehop-dir"], tmpdir());
    expect(result.endsWith("no-such-linehop-dir")).toBe(true);
    expect(existsSync(result)).toBe(false);
  });
});

describe("bundled directories", () => {
  it("locates the routing configs and sample networks", () => {
    expect(findConfigsRoot().endsWith(join("configs", "routing"))).toBe(true);
    expect(existsSync(join(findConfigsRoot(), "base.json"))).toBe(true);
    expect(existsSync(join(findNetworksRoot(), "riverton-metro.json"))).toBe(true);
  });
});
