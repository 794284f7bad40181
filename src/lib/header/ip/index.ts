export * from "./protocols";
export * from "./pseudo";
export * from "./ipv4";
