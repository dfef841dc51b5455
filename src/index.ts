export * from "./alignment";
export * from "./lib/signal";
export {
  EARTH_RADIUS_M,
  enuToGeodetic,
  firstValidGeoPoint,
  projectToEnu,
} from "./lib/geo/enuProjection";
export { createLogger } from "./lib/logger";
export type { Logger } from "./lib/logger";
