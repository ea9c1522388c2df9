/**
 * UUIDv7 for correlation ids. Ids minted in the same millisecond keep their
 * creation order through a 12-bit counter in `rand_a`; when the counter runs
 * out the timestamp moves one millisecond ahead.
 */

type RandomSource = {
  getRandomValues?(bytes: Uint8Array): Uint8Array;
};

let previousInput = -1;
let previousMs = -1;
let previousCounter = 0;

const fillRandom = (bytes: Uint8Array): void => {
  const source = (globalThis as { crypto?: RandomSource }).crypto;
  if (source && typeof source.getRandomValues === 'function') {
    source.getRandomValues(bytes);
    return;
  }
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Math.floor(Math.random() * 256);
  }
};

const toHex = (bytes: Uint8Array): string =>
  Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');

export function uuidv7(now: number = Date.now()): string {
  const bytes = new Uint8Array(16);
  fillRandom(bytes);

  let ms = now;
  let counter = ((bytes[6] & 0x0f) << 8) | bytes[7];
  if (now >= previousInput && now <= previousMs) {
    ms = previousMs;
    counter = previousCounter + 1;
    if (counter > 0x0fff) {
      ms += 1;
      counter = 0;
    }
  }
  previousInput = now;
  previousMs = ms;
  previousCounter = counter;

  for (let i = 0; i < 6; i++) {
    bytes[i] = Math.floor(ms / 2 ** (8 * (5 - i))) & 0xff;
  }

  bytes[6] = 0x70 | ((counter >> 8) & 0x0f);
  bytes[7] = counter & 0xff;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;

  const hex = toHex(bytes);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join('-');
}
