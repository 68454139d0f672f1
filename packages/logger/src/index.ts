import { type LoggerOptions } from "@bitgrid/types";
import loglevel, { type Logger as LoglevelLogger } from "loglevel";
import prefix from "loglevel-plugin-prefix";

export interface ILogger {
	trace(...args: unknown[]): void;
	debug(...args: unknown[]): void;
	info(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	error(...args: unknown[]): void;
}

// loglevel keeps one logger per name, so level and template are shared by context
const configured = new Set<string>();

/**
 * Logger is a class that provides a logger for the application.
 * It provides methods to log messages at different levels.
 */
export class Logger implements ILogger {
	private log: LoglevelLogger;

	/**
	 * Constructor for Logger. The first logger of a context sets its defaults
	 * (level "info", template "%n"); later ones only change what their config names,
	 * and the change applies to every logger of that context.
	 * @param context - The context of the logger
	 * @param config - The configuration for the logger
	 */
	constructor(context: string, config?: LoggerOptions) {
		const isNew = !configured.has(context);
		configured.add(context);

		this.log = loglevel.getLogger(context);
		if (isNew || config?.level !== undefined) {
			this.log.setLevel(config?.level ?? "info");
		}
		if (isNew || config?.template !== undefined) {
			prefix.reg(loglevel);
			prefix.apply(this.log, {
				template: config?.template ?? "%n",
			});
		}
	}

	// methods are looked up on each call, loglevel rebuilds them on every setLevel
	trace(...args: unknown[]): void {
		this.log.trace(...args);
	}

	debug(...args: unknown[]): void {
		this.log.debug(...args);
	}

	info(...args: unknown[]): void {
		this.log.info(...args);
	}

	warn(...args: unknown[]): void {
		this.log.warn(...args);
	}

	error(...args: unknown[]): void {
		this.log.error(...args);
	}

	get level(): number {
		return this.log.getLevel();
	}
}
