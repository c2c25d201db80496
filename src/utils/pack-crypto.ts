/**
 * XOR keystream used for encrypted pack indexes and payloads. Applying it
 * twice with the same seed restores the input.
 */

const KEY_SALT = 0x9e3779b9;

function nextState(state: number): number {
  let next = state;
  next ^= next << 13;
  next ^= next >>> 17;
  next ^= next << 5;
  return next >>> 0;
}

export function xorKeystream(data: Uint8Array, seed: number): Buffer {
  const output = Buffer.alloc(data.length);
  let state = ((seed ^ KEY_SALT) >>> 0) || KEY_SALT;
  for (let index = 0; index < data.length; index++) {
    if (index % 4 === 0) {
      state = nextState(state);
    }
    output[index] = (data[index] ?? 0) ^ ((state >>> ((index % 4) * 8)) & 0xff);
  }
  return output;
}
