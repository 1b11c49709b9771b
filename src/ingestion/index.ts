export { AsyncQueue } from "./async-queue.js";
export {
	DataIngestionLoop,
	type DataIngestionLoopOptions,
	type IngestionEvents,
	type IngestionSink,
} from "./data-ingestion-loop.js";
