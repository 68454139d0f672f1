import { Logger } from "@bitgrid/logger";
import {
	type Bit,
	type BitVectorOptions,
	BitVectorState,
	type IBitVector,
	ValidationMode,
	type ViolationHandler,
	ViolationAction,
} from "@bitgrid/types";
import {
	AllocationError,
	IndexOutOfRangeError,
	NullHandleError,
	validateBitLength,
	validateGroupSize,
} from "@bitgrid/validation";

import { createViolationHandler } from "./contract.js";

function byteLengthOf(bitLength: number): number {
	return Math.ceil(bitLength / 8);
}

/**
 * The byte holding bit `index`. Plain division, so indices past 2^32 keep
 * their high bits.
 */
export function byteIndex(index: number): number {
	return Math.floor(index / 8);
}

/**
 * The mask of bit `index` inside its byte, bit 0 being the least significant.
 */
export function bitMask(index: number): number {
	return 1 << index % 8;
}

function allocate(byteLength: number): Uint8Array {
	try {
		return new Uint8Array(byteLength);
	} catch (error) {
		throw new AllocationError(byteLength, error);
	}
}

/**
 * BitVector is a fixed number of bits packed into an owned byte buffer.
 * Bit `i` lives in byte `floor(i / 8)` at position `i % 8`, bit 0 being the least
 * significant bit of its byte, whatever the platform byte order.
 *
 * Bits past `bitLength` in the last byte are padding. `setAll`, `clearAll` and
 * `not` write them, nothing masks them, and `equals` compares them.
 */
export class BitVector implements IBitVector {
	private _bits: Uint8Array;
	private _bitLength: number;
	private _state: BitVectorState;

	private readonly _options: BitVectorOptions;
	private readonly _strict: boolean;
	private readonly _onViolation: ViolationHandler;
	private readonly _logger: Logger;

	/**
	 * Constructor for the BitVector class, all bits start at 0.
	 * @param bitLength - The number of bits in the BitVector.
	 * @param options - The validation mode, violation handling and logging.
	 */
	constructor(bitLength: number, options: BitVectorOptions = {}) {
		this._bitLength = validateBitLength(bitLength);
		this._options = options;
		this._strict = (options.mode ?? ValidationMode.Strict) === ValidationMode.Strict;
		this._logger = new Logger("bitgrid:bitvector", options.logConfig);
		this._onViolation = createViolationHandler(options.onViolation ?? ViolationAction.Throw, this._logger);
		this._bits = allocate(byteLengthOf(bitLength));
		this._state = BitVectorState.Initialized;
		this._logger.trace(`init: ${bitLength} bits in ${this._bits.length} bytes`);
	}

	/**
	 * Creates an independent copy of `src`: same bit length, every storage byte
	 * copied, padding included.
	 * @param src - The BitVector to copy.
	 * @param options - Options for the copy, the source's by default.
	 * @returns The copy.
	 */
	static copyConstruct(src: BitVector, options: BitVectorOptions = src._options): BitVector {
		src.checkHandles("copyConstruct");
		const copy = new BitVector(src._bitLength, options);
		copy._bits.set(src._bits);
		return copy;
	}

	get bitLength(): number {
		return this._bitLength;
	}

	get byteLength(): number {
		return byteLengthOf(this._bitLength);
	}

	get state(): BitVectorState {
		return this._state;
	}

	/**
	 * Sets the bit at the given index to 1.
	 * @param index - The index of the bit to set.
	 */
	set(index: number): void {
		this.checkIndex("set", index);
		this._bits[byteIndex(index)] |= bitMask(index);
	}

	/**
	 * Sets the bit at the given index to 0.
	 * @param index - The index of the bit to clear.
	 */
	clear(index: number): void {
		this.checkIndex("clear", index);
		this._bits[byteIndex(index)] &= ~bitMask(index);
	}

	/**
	 * Flips the bit at the given index.
	 * @param index - The index of the bit to flip.
	 */
	flip(index: number): void {
		this.checkIndex("flip", index);
		this._bits[byteIndex(index)] ^= bitMask(index);
	}

	/**
	 * Gets the bit at the given index.
	 * @param index - The index of the bit to get.
	 * @returns 1 if the bit is set, 0 otherwise.
	 */
	get(index: number): Bit {
		this.checkIndex("get", index);
		return this.read(index);
	}

	setAll(): void {
		this.checkHandles("setAll");
		this._bits.fill(0xff);
		this._logger.trace(`setAll: ${this._bits.length} bytes`);
	}

	clearAll(): void {
		this.checkHandles("clearAll");
		this._bits.fill(0);
		this._logger.trace(`clearAll: ${this._bits.length} bytes`);
	}

	/**
	 * OR `other` into this BitVector. Only the bytes of the operand with the
	 * smaller bit length are combined, the rest of the longer one is untouched.
	 * @param other - The other BitVector to OR with.
	 * @returns This BitVector.
	 */
	or(other: BitVector): this {
		const byteLength = this.overlap("or", other);
		for (let i = 0; i < byteLength; i++) {
			this._bits[i] |= other._bits[i];
		}
		return this;
	}

	/**
	 * AND `other` into this BitVector, over the bytes of the shorter operand.
	 * @param other - The other BitVector to AND with.
	 * @returns This BitVector.
	 */
	and(other: BitVector): this {
		const byteLength = this.overlap("and", other);
		for (let i = 0; i < byteLength; i++) {
			this._bits[i] &= other._bits[i];
		}
		return this;
	}

	/**
	 * XOR `other` into this BitVector, over the bytes of the shorter operand.
	 * @param other - The other BitVector to XOR with.
	 * @returns This BitVector.
	 */
	xor(other: BitVector): this {
		const byteLength = this.overlap("xor", other);
		for (let i = 0; i < byteLength; i++) {
			this._bits[i] ^= other._bits[i];
		}
		return this;
	}

	/**
	 * NOT the BitVector in place, padding bits included.
	 * @returns This BitVector.
	 */
	not(): this {
		this.checkHandles("not");
		for (let i = 0; i < this._bits.length; i++) {
			this._bits[i] = ~this._bits[i];
		}
		this._logger.trace(`not: ${this._bits.length} bytes`);
		return this;
	}

	/**
	 * Storage-exact comparison: the bit lengths must match, then every byte,
	 * padding bits included.
	 * @param other - The other BitVector.
	 * @returns True if both hold the same bytes.
	 */
	equals(other: BitVector): boolean {
		this.checkHandles("equals", other);
		if (this._bitLength !== other._bitLength) return false;

		const byteLength = this.byteLength;
		for (let i = 0; i < byteLength; i++) {
			if (this._bits[i] !== other._bits[i]) return false;
		}
		return true;
	}

	clone(): BitVector {
		return BitVector.copyConstruct(this);
	}

	/**
	 * Copies the storage, padding bits included.
	 * @returns The bytes of the BitVector.
	 */
	toBytes(): Uint8Array {
		this.checkHandles("toBytes");
		return this._bits.slice();
	}

	/**
	 * Renders bits `0..bitLength` as 0s and 1s. Only full groups are followed
	 * by a line break: there is no trailing `\n` after a final partial group,
	 * and none at all without a group size.
	 * @param groupSize - Bits per line, a line break follows every full group.
	 * @returns The rendered bits.
	 */
	render(groupSize?: number): string {
		const group = groupSize === undefined ? undefined : validateGroupSize(groupSize);
		this.checkHandles("render");

		let out = "";
		for (let i = 0; i < this._bitLength; i++) {
			out += this.read(i);
			if (group !== undefined && (i + 1) % group === 0) {
				out += "\n";
			}
		}
		return out;
	}

	toString(): string {
		return this.render();
	}

	/**
	 * Drops the storage and resets the bit length to 0. Any further use of the
	 * BitVector is a contract violation.
	 */
	release(): void {
		this.checkHandles("release");
		this._bits = new Uint8Array(0);
		this._bitLength = 0;
		this._state = BitVectorState.Released;
		this._logger.trace("release");
	}

	private read(index: number): Bit {
		return (this._bits[byteIndex(index)] & bitMask(index)) === 0 ? 0 : 1;
	}

	private overlap(operation: string, other: BitVector): number {
		this.checkHandles(operation, other);
		// the shorter operand is picked by bit length, then rounded up to bytes
		const shorter = this._bitLength < other._bitLength ? this : other;
		this._logger.trace(`${operation}: ${shorter.byteLength} bytes`);
		return shorter.byteLength;
	}

	private checkHandles(operation: string, other?: BitVector): void {
		if (!this._strict) return;
		if (this._state === BitVectorState.Released || other?._state === BitVectorState.Released) {
			this._onViolation(new NullHandleError(operation));
		}
	}

	private checkIndex(operation: string, index: number): void {
		if (!this._strict) return;
		if (this._state === BitVectorState.Released) {
			this._onViolation(new NullHandleError(operation));
		} else if (!Number.isInteger(index) || index < 0 || index >= this._bitLength) {
			this._onViolation(new IndexOutOfRangeError(operation, index, this._bitLength));
		}
	}
}
