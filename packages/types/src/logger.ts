import { type LogLevelDesc } from "loglevel";

export interface LoggerOptions {
	/**
	 * The minimum level that is written.
	 * @default "info"
	 */
	level?: LogLevelDesc;
	/**
	 * The loglevel-plugin-prefix template, `%n` is the logger name.
	 * @default "%n"
	 */
	template?: string;
}
