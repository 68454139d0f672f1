import { type ILogger } from "@bitgrid/logger";
import { type ViolationHandler, ViolationAction } from "@bitgrid/types";

/**
 * Turns the configured violation action into a handler. Custom handlers are
 * returned as they are.
 * @param onViolation - The action or handler to use
 * @param logger - Where `Abort` and `Log` report the violation
 * @returns The handler strict-mode checks report to
 */
export function createViolationHandler(
	onViolation: ViolationAction | ViolationHandler,
	logger: ILogger
): ViolationHandler {
	if (typeof onViolation === "function") return onViolation;

	switch (onViolation) {
		case ViolationAction.Throw:
			return (error: Error): void => {
				throw error;
			};
		case ViolationAction.Abort:
			return (error: Error): void => {
				logger.error("Validation failed:", error.message);
				process.abort();
			};
		case ViolationAction.Log:
			return (error: Error): void => {
				logger.error("Validation failed:", error.message);
			};
	}
}
