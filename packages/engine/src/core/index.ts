export * from "./grid";
export * from "./hash";
