import { createLogger, describeError } from "@algorunner/core";

import type { EngineEvent, EngineNotifier } from "./types";

const notifierLogger = createLogger("runtime:notifier");

/**
 * Default notifier: operator alerts go to the log stream.
 */
export class LoggingNotifier implements EngineNotifier {
	notify(event: EngineEvent): void {
		const { type, ...details } = event;
		notifierLogger.error(type, details);
	}
}

/**
 * Deliver an event without letting a failing notifier break the caller.
 */
export const deliver = async (
	notifier: EngineNotifier,
	event: EngineEvent
): Promise<void> => {
	try {
		await notifier.notify(event);
	} catch (error) {
		notifierLogger.warn("notifier_failed", {
			eventType: event.type,
			error: describeError(error),
		});
	}
};
