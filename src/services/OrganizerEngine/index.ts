export * from "./OrganizeOptions";
export * from "./OrganizerEngine";
export * from "./OrganizerEngineDefault";
