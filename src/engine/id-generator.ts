import { createHash } from 'node:crypto';

/** Derives content-addressed identifiers. */
export interface IdGenerator {
  next(now: number, counter: number, entropy: string): string;
}

// 64 hex chars
export const sha256IdGenerator: IdGenerator = {
  next(now, counter, entropy) {
    return createHash('sha256')
      .update(`${now}:${counter}:${entropy}`)
      .digest('hex');
  },
};
