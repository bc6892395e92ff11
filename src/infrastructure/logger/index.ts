export { getLogger, logger } from "./Logger";
export type { AppLogger } from "./Logger";
