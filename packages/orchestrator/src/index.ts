export * from "./agents";
export * from "./branch";
export * from "./epics";
export * from "./policy";
export * from "./runtime";
