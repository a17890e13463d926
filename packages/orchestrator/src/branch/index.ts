export * from "./branch";
export * from "./events";
