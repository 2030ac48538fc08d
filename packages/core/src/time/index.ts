export * from "./time";
export * from "./tradingHours";
export * from "./clock";
