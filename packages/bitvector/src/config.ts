import { Logger } from "@bitgrid/logger";
import { type BitVectorConfig, type BitVectorOptions } from "@bitgrid/types";
import { validateBitVectorConfig } from "@bitgrid/validation";
import * as dotenv from "dotenv";
import fs from "node:fs";

const log = new Logger("bitgrid:config");

/**
 * Load the bit vector configuration.
 * @param configPath - The path to a JSON configuration file.
 * @returns The configuration, or undefined when neither a file nor an environment variable provides one.
 */
export function loadConfig(configPath?: string | undefined): BitVectorConfig | undefined {
	if (configPath) {
		try {
			return validateBitVectorConfig(JSON.parse(fs.readFileSync(configPath, "utf8")));
		} catch (error) {
			log.error(`Failed to load config from ${configPath}:`, error);
			throw error;
		}
	}

	dotenv.config();

	const hasEnvConfig = ["BITVECTOR_MODE", "BITVECTOR_ON_VIOLATION", "BITVECTOR_LOG_LEVEL"].some(
		(key) => process.env[key] !== undefined
	);

	if (!hasEnvConfig) {
		return undefined;
	}

	return validateBitVectorConfig({
		mode: process.env.BITVECTOR_MODE,
		on_violation: process.env.BITVECTOR_ON_VIOLATION,
		log_config: process.env.BITVECTOR_LOG_LEVEL ? { level: process.env.BITVECTOR_LOG_LEVEL } : undefined,
	});
}

/**
 * Maps a loaded configuration onto the options of a BitVector.
 * @param config - The configuration, as returned by {@link loadConfig}.
 * @returns The BitVector options.
 */
export function toBitVectorOptions(config: BitVectorConfig = {}): BitVectorOptions {
	return {
		mode: config.mode,
		onViolation: config.on_violation,
		logConfig: config.log_config,
	};
}
