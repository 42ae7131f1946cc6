/**
 * Largest cell count a grid may have (2^31 - 1).
 *
 * Every flat index then fits a signed 32-bit integer and a typed array
 * length, and `y * width + x` stays exact in double precision.
 */
export const MAX_GRID_CELLS = 0x7FFFFFFF;

/**
 * Euclidean remainder: result is in [0, modulus) for any integer value.
 *
 * `%` keeps the sign of the dividend (-1 % 3 === -1), so a negative
 * remainder is shifted up by one modulus. Zero results are normalized,
 * since -3 % 3 is -0.
 */
export function floorMod(value: number, modulus: number): number {
    const rem = value % modulus;
    if (rem < 0) return rem + modulus;
    return rem === 0 ? 0 : rem;
}
