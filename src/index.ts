export { formula, Hash, HASHES, hash, indices } from "./collections/hash.ts";
export { BloomSet } from "./collections/bloomSet.ts";
