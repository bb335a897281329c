export { DEFAULT_ARG_FORMATTERS, createArgResolver } from "./resolver.js";
export { formatProfileArg, summarizeProfile } from "./profile.js";
export { flattenContext, isPlainObject, isPresent, ownValue } from "./flatten.js";
export {
  DEFAULT_RESOLUTION_TABLES,
  EMPTY_RESOLUTION_TABLES,
  TEXT_LIKE_PARAMS,
  indexRoles,
} from "./tables.js";
export { createMemoryStore } from "./memory.js";
export type {
  ArgFormatter,
  ArgResolver,
  ArgResolverConfig,
  MemoryStore,
  ResolutionReport,
  ResolutionResult,
  ResolutionSource,
  ResolutionTables,
  ResolveRequest,
  ResolvedArgs,
  RoleDefinition,
  RoleSource,
} from "./types.js";
