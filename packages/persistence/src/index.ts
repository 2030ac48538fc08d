export {
	FileCheckpointStore,
	MemoryCheckpointStore,
	checkpointFileName,
	parseCheckpoint,
} from "./fileCheckpointStore";
