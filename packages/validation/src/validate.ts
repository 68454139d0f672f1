import { type BitVectorConfig } from "@bitgrid/types";
import { type z } from "zod";

import { BitVectorValidationError } from "./errors.js";
import { BitLengthSchema, BitVectorConfigSchema, CoordinatesSchema, GroupSizeSchema } from "./schemas/bitvector.js";

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
	const result = schema.safeParse(value);
	if (!result.success) {
		throw new BitVectorValidationError(result.error);
	}
	return result.data;
}

/**
 * Validates the number of bits requested for a new vector.
 * @param bitLength - The requested bit length
 * @returns The validated bit length
 */
export function validateBitLength(bitLength: number): number {
	return parseOrThrow(BitLengthSchema, bitLength);
}

/**
 * Validates the line width of a rendered vector.
 * @param groupSize - The number of bits per line
 * @returns The validated group size
 */
export function validateGroupSize(groupSize: number): number {
	return parseOrThrow(GroupSizeSchema, groupSize);
}

/**
 * Checks that `indices` address a cell inside `dims`: same length, every
 * coordinate in `[0, dims[i])`. The index mapping helpers leave this to the caller.
 * @param dims - The extent of each dimension
 * @param indices - One coordinate per dimension
 */
export function validateCoordinates(dims: readonly number[], indices: readonly number[]): void {
	parseOrThrow(CoordinatesSchema, { dims, indices });
}

/**
 * Validates a bit vector configuration read from a file or the environment.
 * @param config - The raw configuration
 * @returns The validated configuration
 */
export function validateBitVectorConfig(config: unknown): BitVectorConfig {
	return parseOrThrow(BitVectorConfigSchema, config);
}
