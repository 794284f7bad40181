export * from "./flags";
export * from "./tcp";
export * from "./checksum";
export * from "./builder";
export * from "./segment";
