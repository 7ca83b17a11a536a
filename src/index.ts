export * from "./lib/math/vectorMath";
export * from "./lib/signal/OneEuroFilter";
export * from "./lib/signal/SmoothingEngine";
export * from "./biomech/canonicalBones";
export * from "./biomech/CanonicalPose";
export * from "./biomech/landmarks";
export * from "./biomech/PoseMapper";
export * from "./retarget/BoneHandle";
export * from "./retarget/SkeletonBinding";
export * from "./retarget/RootMotionEstimator";
export * from "./retarget/Retargeter";
export * from "./retarget/RetargetSession";
export * from "./store/useRetargetSettingsStore";
export {
  createLogger,
  getLogLevel,
  setLogLevel,
  type Logger,
  type LogLevel,
} from "./lib/logger";
