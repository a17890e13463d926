export * from "./admission-gate";
export * from "./coordinator";
export * from "./progress";
export * from "./schema";
export * from "./state-machine";
export * from "./types";
