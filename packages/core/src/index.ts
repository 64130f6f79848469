export { default as logger } from "./server/logger";
export * from "./server/util";
export * from "./types";
