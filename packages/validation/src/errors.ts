import { type ZodError } from "zod";

/**
 * A custom error class for bit vector argument validation errors
 */
export class BitVectorValidationError extends Error {
	zodError: ZodError;

	/**
	 * @param zodError - The zod error
	 */
	constructor(zodError: ZodError) {
		super(zodError.message);
		this.zodError = zodError;
		this.name = "BitVectorValidationError";
	}
}

/**
 * Base class for broken preconditions, reported only in strict mode
 */
export class ContractViolationError extends Error {
	readonly operation: string;

	/**
	 * @param operation - The operation whose precondition failed
	 * @param message - The message of the error
	 */
	constructor(operation: string, message: string) {
		super(`${operation}: ${message}`);
		this.operation = operation;
		this.name = "ContractViolationError";
	}
}

/**
 * A custom error class for operations on a released bit vector
 */
export class NullHandleError extends ContractViolationError {
	/**
	 * @param operation - The operation that received the released vector
	 */
	constructor(operation: string) {
		super(operation, "BitVector is released");
		this.name = "NullHandleError";
	}
}

/**
 * A custom error class for bit indices outside `[0, bitLength)`
 */
export class IndexOutOfRangeError extends ContractViolationError {
	readonly index: number;
	readonly bitLength: number;

	/**
	 * @param operation - The operation that received the index
	 * @param index - The offending index
	 * @param bitLength - The bit length of the vector
	 */
	constructor(operation: string, index: number, bitLength: number) {
		super(operation, `Index ${index} out of bounds for length ${bitLength}`);
		this.index = index;
		this.bitLength = bitLength;
		this.name = "IndexOutOfRangeError";
	}
}

/**
 * A custom error class for storage that could not be allocated
 */
export class AllocationError extends Error {
	readonly byteLength: number;

	/**
	 * @param byteLength - The number of bytes requested
	 * @param cause - The error raised by the allocation
	 */
	constructor(byteLength: number, cause?: unknown) {
		super(`Memory allocation of ${byteLength} bytes failed`, { cause });
		this.byteLength = byteLength;
		this.name = "AllocationError";
	}
}
