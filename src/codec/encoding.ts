/**
 * Shared TextEncoder/TextDecoder singletons.
 * Bridge between JavaScript strings and encoded byte sequences.
 */

export const textEncoder = new TextEncoder();
export const textDecoder = new TextDecoder();
