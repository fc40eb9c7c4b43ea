import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex } from '@noble/hashes/utils';
import type { Program } from '../machine/instruction.js';
import { canonicalProgramJson } from './json.js';

export function blake3hex(data: Uint8Array | string): string {
  const input = typeof data === 'string' ? new TextEncoder().encode(data) : data;
  return bytesToHex(blake3(input));
}

/** Content address of a program: BLAKE3 over its canonical JSON encoding. */
export function programHash(program: Program): string {
  return blake3hex(canonicalProgramJson(program));
}
