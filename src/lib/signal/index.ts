export * from "./resample";
export * from "./crossCorrelation";
export * from "./peakInterpolation";
export * from "./spectrum";
