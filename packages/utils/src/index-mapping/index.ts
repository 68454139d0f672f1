/**
 * Folds a coordinate tuple into a flat, row-major index: the last dimension
 * varies fastest, as in a C multi-dimensional array.
 *
 * Coordinates are not checked against `dims`, see `validateCoordinates` in
 * `@bitgrid/validation`.
 *
 * @param dims - The extent of each dimension
 * @param indices - One coordinate per dimension
 * @returns The linear index
 *
 * @example
 * ```ts
 * linearIndex([2, 2], [1, 1]) // returns 3
 * linearIndex([3, 4], [2, 1]) // returns 9
 * ```
 */
export function linearIndex(dims: readonly number[], indices: readonly number[]): number {
	let index = 0;
	let multiplier = 1;
	for (let i = dims.length - 1; i >= 0; i--) {
		index += indices[i] * multiplier;
		multiplier *= dims[i];
	}
	return index;
}

/**
 * Recovers the coordinate tuple of a row-major linear index. Exact inverse of
 * {@link linearIndex} on `[0, product(dims))`; larger indices wrap around.
 *
 * @param dims - The extent of each dimension
 * @param index - The linear index
 * @returns One coordinate per dimension
 *
 * @example
 * ```ts
 * inverseLinearIndex([2, 2], 3) // returns [1, 1]
 * inverseLinearIndex([2, 2], 5) // returns [0, 1]
 * ```
 */
export function inverseLinearIndex(dims: readonly number[], index: number): number[] {
	const indices = new Array<number>(dims.length);
	let rest = index;
	for (let d = dims.length - 1; d >= 0; d--) {
		indices[d] = rest % dims[d];
		rest = Math.floor(rest / dims[d]);
	}
	return indices;
}
