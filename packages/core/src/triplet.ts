/**
 * @module @wasmrig/core/triplet
 * Compilation triplets and their families
 */

export type Triplet =
  | { kind: 'asmjs-emscripten'; name: 'asmjs-unknown-emscripten' }
  | { kind: 'wasm-emscripten'; name: 'wasm32-unknown-emscripten' }
  | { kind: 'wasm-native'; name: 'wasm32-unknown-unknown' };

export type TripletKind = Triplet['kind'];

export const ASMJS_EMSCRIPTEN: Triplet = { kind: 'asmjs-emscripten', name: 'asmjs-unknown-emscripten' };
export const WASM_EMSCRIPTEN: Triplet = { kind: 'wasm-emscripten', name: 'wasm32-unknown-emscripten' };
export const WASM_NATIVE: Triplet = { kind: 'wasm-native', name: 'wasm32-unknown-unknown' };

export function isEmscripten(triplet: Triplet): boolean {
  return triplet.kind === 'asmjs-emscripten' || triplet.kind === 'wasm-emscripten';
}

export function isWasm(triplet: Triplet): boolean {
  return triplet.kind === 'wasm-emscripten' || triplet.kind === 'wasm-native';
}

export function isNativeWasm(triplet: Triplet): boolean {
  return triplet.kind === 'wasm-native';
}
