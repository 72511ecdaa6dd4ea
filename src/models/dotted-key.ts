import { InvalidKeyError } from '../errors.js';

/** A `section.key` address split into its two components. */
export interface DottedKey {
  readonly section: string;
  readonly key: string;
}

/**
 * Split a dotted key on its first `.`.
 *
 * `a.b.c` addresses key `b.c` in section `a`.
 *
 * @throws {InvalidKeyError} when there is no separator or either side is empty.
 */
export function parseDottedKey(dotted: string): DottedKey {
  const idx = dotted.indexOf('.');
  if (idx === -1) {
    throw new InvalidKeyError(dotted, "expected 'section.key'");
  }

  const section = dotted.slice(0, idx);
  const key = dotted.slice(idx + 1);
  if (section.length === 0) {
    throw new InvalidKeyError(dotted, 'section name is empty');
  }
  if (key.length === 0) {
    throw new InvalidKeyError(dotted, 'key name is empty');
  }
  return { section, key };
}

export function formatDottedKey({ section, key }: DottedKey): string {
  return `${section}.${key}`;
}
