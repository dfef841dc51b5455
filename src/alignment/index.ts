/**
 * Alignment Module Barrel Export
 * ==============================
 */

export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./tracks";
export { fuseAxisOffsets } from "./offsetFusion";
export type { FusedOffset } from "./offsetFusion";
export { residualSpatialOffset } from "./residual";
export {
  AlignmentEngine,
  POSITION_AXES,
  DEFAULT_ATTITUDE_AXIS,
} from "./AlignmentEngine";
export { alignPayload } from "./alignSession";
export type {
  PayloadStream,
  PayloadTracks,
  ReferenceTracks,
  SessionAlignment,
  StreamAlignment,
} from "./alignSession";
export { Synchronizer } from "./Synchronizer";
export type {
  AddSourceOptions,
  SourceInfo,
  SynchronizedTable,
  SynchronizeOptions,
  TabularSource,
} from "./Synchronizer";
