import { type BitVectorState, type ValidationMode, type ViolationAction } from "./enum.js";
import { type LoggerOptions } from "./logger.js";

export type Bit = 0 | 1;

/**
 * Called with the contract violation detected by a strict-mode bit vector.
 * Returning normally lets the operation carry on.
 */
export type ViolationHandler = (error: Error) => void;

export interface BitVectorOptions {
	/**
	 * Whether preconditions are checked before each operation.
	 * @default ValidationMode.Strict
	 */
	mode?: ValidationMode;
	/**
	 * What happens when a strict-mode check fails.
	 * @default ViolationAction.Throw
	 */
	onViolation?: ViolationAction | ViolationHandler;
	logConfig?: LoggerOptions;
}

export interface IBitVector {
	/**
	 * The number of addressable bits, 0 once released.
	 */
	readonly bitLength: number;
	/**
	 * The number of storage bytes, `ceil(bitLength / 8)`.
	 */
	readonly byteLength: number;
	/**
	 * The lifecycle state of the vector.
	 */
	readonly state: BitVectorState;
	/**
	 * Sets the bit at the given index to 1.
	 * @param index - The index of the bit to set.
	 */
	set(index: number): void;
	/**
	 * Sets the bit at the given index to 0.
	 * @param index - The index of the bit to clear.
	 */
	clear(index: number): void;
	/**
	 * Flips the bit at the given index.
	 * @param index - The index of the bit to flip
	 */
	flip(index: number): void;
	/**
	 * Returns the bit at the given index.
	 * @param index - The index of the bit to get.
	 */
	get(index: number): Bit;
	/**
	 * Sets every storage byte to 0xff, padding bits included.
	 */
	setAll(): void;
	/**
	 * Sets every storage byte to 0x00, padding bits included.
	 */
	clearAll(): void;
	/**
	 * ORs `other` into this vector, over the bytes of the shorter of the two.
	 * @param other - The other bit vector.
	 */
	or(other: IBitVector): this;
	/**
	 * ANDs `other` into this vector, over the bytes of the shorter of the two.
	 * @param other - The other bit vector.
	 */
	and(other: IBitVector): this;
	/**
	 * XORs `other` into this vector, over the bytes of the shorter of the two.
	 * @param other - The other bit vector.
	 */
	xor(other: IBitVector): this;
	/**
	 * Complements every storage byte in place, padding bits included.
	 */
	not(): this;
	/**
	 * Compares bit lengths, then every storage byte including padding.
	 * @param other - The other bit vector.
	 */
	equals(other: IBitVector): boolean;
	/**
	 * Returns a new vector with its own copy of the storage.
	 */
	clone(): IBitVector;
	/**
	 * Returns a copy of the storage bytes.
	 */
	toBytes(): Uint8Array;
	/**
	 * Renders the bits as 0s and 1s, with a line break after every `groupSize` bits.
	 * @param groupSize - The number of bits per line, all on one line when omitted.
	 */
	render(groupSize?: number): string;
	/**
	 * Drops the storage and resets the bit length to 0.
	 */
	release(): void;
}
