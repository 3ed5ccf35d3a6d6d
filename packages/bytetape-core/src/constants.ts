/**
 * Machine defaults
 */

/** Number of cells on the tape unless a caller asks for another size */
export const DEFAULT_TAPE_LENGTH = 30000;

/** Cell values wrap modulo this */
export const CELL_MODULUS = 256;
