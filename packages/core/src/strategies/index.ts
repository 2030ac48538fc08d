export * from "./types";
export * from "./registry";
export * from "./validateSignal";
export * from "./parameters";
export * from "./emaCrossover";
export * from "./smaCrossover";
export * from "./builtins";
