// Alphabet: one symbol per byte value
export const NUM_SYMBOLS = 256

export const MAX_FREQUENCY = 0xFFFFFFFF
