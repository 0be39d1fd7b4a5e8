export {
  loadBaseConfig,
  loadProfileConfig,
  listProfiles,
  findConfigsRoot,
  mergeConfig,
  readOverrides,
  DEFAULT_ROUTING_CONFIG,
  type RoutingConfig,
  type ProfileConfig,
  type ProfileInfo,
} from "./routing-config.js";
