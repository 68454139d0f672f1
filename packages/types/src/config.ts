import { type ValidationMode, type ViolationAction } from "./enum.js";
import { type LoggerOptions } from "./logger.js";

// snake_casing to match the JSON config
export interface BitVectorConfig {
	mode?: ValidationMode;
	on_violation?: ViolationAction;
	log_config?: LoggerOptions;
}
