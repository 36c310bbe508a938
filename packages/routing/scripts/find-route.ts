/**
 * Find and explain the optimal route between two stations.
 *
 * Usage: npx tsx scripts/find-route.ts <origin> <destination> [--network path] [--profile name]
 *
 * Options:
 *   --network   Network JSON file (default: bundled Riverton Metro sample)
 *   --profile   Routing profile from configs/routing/profiles (default: base config)
 *   --list      List stations and profiles, then exit
 */

import {
  InferenceEngine,
  explanationToText,
  listRoutingProfiles,
  loadBaseRoutingConfig,
  loadNetworkFile,
  loadRoutingProfile,
  loadSampleNetwork,
  parseArgs,
} from "../src/index.js";

function main(): void {
  const { positional, options, flags } = parseArgs(process.argv.slice(2), ["--network", "--profile"]);
  const networkPath = options.get("--network");
  const network = networkPath ? loadNetworkFile(networkPath) : loadSampleNetwork();
  const kb = network.knowledgeBase;

  if (flags.has("--list")) {
    console.log("Stations:");
    for (const station of [...kb.stations()].sort((a, b) => a.name.localeCompare(b.name))) {
      console.log(`  ${station.name} [${station.line}]`);
    }
    console.log("\nProfiles:");
    for (const profile of listRoutingProfiles()) {
      console.log(`  ${profile.name}: ${profile.description}`);
    }
    return;
  }

  const [origin, destination] = positional;
  if (!origin || !destination) {
    console.error("Usage: find-route <origin> <destination> [--network path] [--profile name] [--list]");
    process.exitCode = 2;
    return;
  }

  if (network.violations.length > 0) {
    console.warn(`Network has ${network.violations.length} consistency issue(s); results may not be optimal.`);
  }

  const profileName = options.get("--profile");
  const params = profileName ? loadRoutingProfile(profileName) : loadBaseRoutingConfig();
  const engine = new InferenceEngine(kb, params);

  const result = engine.findOptimalRoute(origin, destination);
  console.log(explanationToText(engine.explainRoute(result.path, result.statistics)));
  console.log(`Total cost: ${result.totalCost.toFixed(2)} (transfer penalty ${engine.transferPenalty})`);
}

try {
  main();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}
