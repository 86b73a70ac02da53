export { gridChecksum } from "./checksum";
export { FNV64Hasher, fnv64Hash } from "./fnv64";
