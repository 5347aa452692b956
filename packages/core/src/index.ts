export * from "./base-dirs";
export * from "./errors";
export * from "./path-resolver";
export * from "./resource-accessor";
export * from "./standard-locations";
