export { loadConfig } from "./loadConfig";
export { ConfigError } from "./configError";
