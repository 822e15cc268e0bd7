/**
 * Payload helpers
 *
 * Node actions exchange raw bytes; these convert UTF-8 text at the edges.
 *
 * @module @flowgraph/engine/node/bytes
 */

export function toBytes(text: string): Uint8Array {
  return Buffer.from(text, 'utf8');
}

export function fromBytes(bytes: Uint8Array | undefined): string {
  if (!bytes) return '';
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8');
}

export const EMPTY_BYTES: Uint8Array = new Uint8Array(0);
