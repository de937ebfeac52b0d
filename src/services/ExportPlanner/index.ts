export * from "./ExportPlanner";
export * from "./ExportPlannerDefault";
export * from "./MissingFileReport";
