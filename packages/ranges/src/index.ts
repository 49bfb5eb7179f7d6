export * from "./range.set.js";
export * from "./resume.planner.js";
