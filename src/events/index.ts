export {
	EventType,
	EventCategory,
	ALL_EVENT_TYPES,
	isEventType,
	parseEventType,
	categoryOf,
	typesInCategory,
} from "./event-types.js";
export type { BusEvent, EventPayload } from "./event-types.js";

export { EventBus } from "./event-bus.js";
export type {
	EventHandler,
	HandlerErrorCallback,
	EmitReport,
	EventBusOptions,
} from "./event-bus.js";
