// Re-export modules for library usage
export * from "./types";
export * from "./errors";
export { loadConfig, ConfigSchema, type Config } from "./config";
export * from "./scrapers";
export {
  buildUserByHandle,
  buildTimeline,
  buildClientEvent,
  DEFAULT_TIMELINE_COUNT,
  type GraphqlRequest,
  type ClientEventRequest,
} from "./graphql/requests";
export * from "./parser";
export * from "./session";
