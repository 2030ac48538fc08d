export { loadRuntime } from "./loadRuntime";
export type { LoadRuntimeOptions, RuntimeContext } from "./loadRuntime";
export {
	createBrokerClient,
	hasBrokerCredentials,
} from "./createBrokerClient";
export type { BrokerClient } from "./createBrokerClient";
export { createBacktestEngine, createRealtimeEngine } from "./createEngine";
export type { EngineOverrides, WiredEngine } from "./createEngine";
