export const ABSENT = -1;

// Cursor position that stays past every stored cell however the store grows.
export const CURSOR_END = Number.POSITIVE_INFINITY;

// Coordinate hashing: golden-ratio seed, then a murmur-style
// multiply-rotate round per 32-bit half and a final avalanche.
export const HASH_GOLDEN_RATIO = 0x9e3779b9;
export const MIX_C1 = 0xcc9e2d51;
export const MIX_C2 = 0x1b873593;
export const MIX_ROUND_ADD = 0xe6546b64;
export const AVALANCHE_C1 = 0x85ebca6b;
export const AVALANCHE_C2 = 0xc2b2ae35;
export const TWO_POW_32 = 0x100000000;

// HashStore defaults
export const DEFAULT_INITIAL_CAPACITY = 16;
export const GROWTH_FACTOR = 2;
export const TOMBSTONE = -2;
export const MAX_LOAD_FACTOR = 0.75;
