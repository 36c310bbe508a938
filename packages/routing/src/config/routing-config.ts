/**
 * Layered JSON config system for routing parameters.
 *
 * `configs/routing/base.json` holds the full parameter set; named profiles
 * under `configs/routing/profiles/` are partial overrides applied on top of
 * it. When the base file is missing the hardcoded defaults apply.
 */

import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

import type { HeuristicMode } from "@linehop/types";
import { InvalidConfigError } from "../errors.js";
import { findRepoDir } from "../repo-paths.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Parameters of the cost model and the search */
export interface RoutingParams {
  /**
   * Cost added once per line change, in the kilometre unit of connection
   * distances.
   */
  transferPenalty: number;
  /** Heuristic guiding the search */
  heuristic: HeuristicMode;
}

export interface ProfileInfo {
  name: string;
  description: string;
}

export interface ProfileConfig extends ProfileInfo {
  overrides: Partial<RoutingParams>;
}

const RoutingParamsSchema = z
  .object({
    transferPenalty: z.number().finite().min(0, "must be >= 0"),
    heuristic: z.enum(["geographic", "none"]),
  })
  .strict();

const ProfileConfigSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  overrides: RoutingParamsSchema.partial(),
});

const DEFAULT_ROUTING_PARAMS: RoutingParams = {
  transferPenalty: 2,
  heuristic: "geographic",
};

/** Hardcoded defaults, used when no base config file exists */
export function getDefaultRoutingParams(): RoutingParams {
  return { ...DEFAULT_ROUTING_PARAMS };
}

/**
 * Check a parameter set, throwing on the first out-of-range field.
 *
 * @throws InvalidConfigError
 */
export function validateRoutingParams(params: RoutingParams): RoutingParams {
  const result = RoutingParamsSchema.safeParse(params);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidConfigError(issue?.path.join(".") ?? "", issue?.message ?? "invalid value");
  }
  return result.data;
}

/** Apply overrides on top of a base parameter set; undefined leaves the base value. */
export function mergeRoutingParams(base: RoutingParams, overrides: Partial<RoutingParams>): RoutingParams {
  return {
    transferPenalty: overrides.transferPenalty ?? base.transferPenalty,
    heuristic: overrides.heuristic ?? base.heuristic,
  };
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

/** `configs/routing/` at the repository root */
export function findConfigsRoot(): string {
  return findRepoDir(["configs", "routing"]);
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

function readJson(filePath: string, field: string): unknown {
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidConfigError(field, `cannot read ${filePath}: ${reason}`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/** Load `base.json`. Falls back to hardcoded defaults if the file is absent. */
export function loadBaseRoutingConfig(configsRoot: string = findConfigsRoot()): RoutingParams {
  const filePath = join(configsRoot, "base.json");
  if (!existsSync(filePath)) {
    return getDefaultRoutingParams();
  }

  const parsed = RoutingParamsSchema.safeParse(readJson(filePath, "base"));
  if (!parsed.success) {
    throw new InvalidConfigError("base", describeIssues(parsed.error));
  }
  return parsed.data;
}

function readProfile(filePath: string, field: string): ProfileConfig {
  const parsed = ProfileConfigSchema.safeParse(readJson(filePath, field));
  if (!parsed.success) {
    throw new InvalidConfigError(field, describeIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Load a profile, merging its overrides on top of the base.
 *
 * @throws InvalidConfigError if the profile does not exist or is malformed
 */
export function loadRoutingProfile(
  profileName: string,
  configsRoot: string = findConfigsRoot(),
): RoutingParams & { _profile: ProfileInfo } {
  const filePath = join(configsRoot, "profiles", `${profileName}.json`);
  if (!existsSync(filePath)) {
    throw new InvalidConfigError(`profiles.${profileName}`, "profile not found");
  }

  const profile = readProfile(filePath, `profiles.${profileName}`);
  const merged = mergeRoutingParams(loadBaseRoutingConfig(configsRoot), profile.overrides);

  return {
    ...merged,
    _profile: { name: profile.name, description: profile.description },
  };
}

/** List all available profiles, sorted by file name. Malformed files are skipped with a warning. */
export function listRoutingProfiles(configsRoot: string = findConfigsRoot()): ProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");
  if (!existsSync(profilesDir)) return [];

  const files = readdirSync(profilesDir)
    .filter((f) => f.endsWith(".json"))
    .sort();
  const profiles: ProfileInfo[] = [];

  for (const file of files) {
    try {
      const profile = readProfile(join(profilesDir, file), `profiles.${file}`);
      profiles.push({ name: profile.name, description: profile.description });
    } catch (err) {
      if (!(err instanceof InvalidConfigError)) throw err;
      console.warn(`[routing-config] Skipping ${file}: ${err.message}`);
    }
  }

  return profiles;
}
