export * from "./RenamePlanner";
export * from "./RenamePlannerDefault";
