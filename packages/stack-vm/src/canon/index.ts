export { canonicalProgramJson } from './json.js';
export { blake3hex, programHash } from './fingerprint.js';
