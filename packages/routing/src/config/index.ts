export {
  findConfigsRoot,
  getDefaultRoutingParams,
  listRoutingProfiles,
  loadBaseRoutingConfig,
  loadRoutingProfile,
  mergeRoutingParams,
  validateRoutingParams,
  type ProfileConfig,
  type ProfileInfo,
  type RoutingParams,
} from "./routing-config.js";
