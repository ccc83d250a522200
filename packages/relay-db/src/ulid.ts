import { randomInt } from 'crypto';

// Sortable identifier: 48-bit millisecond timestamp (10 chars) followed by
// 80 bits of randomness (16 chars), Crockford base32.

const CROCKFORD = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

function encodeTime(ms: number): string {
  let out = '';
  let rest = ms;
  for (let i = 0; i < 10; i++) {
    out = CROCKFORD[rest % 32] + out;
    rest = Math.floor(rest / 32);
  }
  return out;
}

export function ulid(now: number = Date.now()): string {
  let random = '';
  for (let i = 0; i < 16; i++) {
    random += CROCKFORD[randomInt(32)];
  }
  return encodeTime(now) + random;
}
