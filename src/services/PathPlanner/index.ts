export * from "./DateTemplate";
export * from "./PathPlanner";
export * from "./PathPlannerDefault";
