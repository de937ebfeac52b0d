export * from "./CoordinateTransform";
export * from "./GeometryEngine";
export * from "./GeometryEngineDefault";
