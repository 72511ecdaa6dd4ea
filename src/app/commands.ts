/**
 * CLI commands.
 *
 * Each function takes a CredentialStore and returns the lines to print on
 * stdout. Failures are thrown: store errors as-is, anything else as a
 * CommandError. Printing and exit codes are left to `cli/main.ts`.
 */

import { isCredentialStoreError } from '../errors.js';
import { parseDottedKey } from '../models/dotted-key.js';
import { Value, type ValueKind } from '../models/value.js';
import { type CredentialStore } from '../store/credential-store.js';

/** A failure outside the store (cancelled prompt, empty listing, ...). */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

/** Reads a secret without echoing it. Resolves `null` when cancelled. */
export type SecretPrompt = (message: string) => Promise<string | null>;

// ---------------------------------------------------------------------------
// set / get / remove
// ---------------------------------------------------------------------------

/**
 * Store `value` under `key` as `kind`. When `value` is omitted the user is
 * prompted; the key is validated before prompting.
 */
export async function setCommand(
  store: CredentialStore,
  key: string,
  value: string | undefined,
  kind: ValueKind,
  prompt: SecretPrompt,
): Promise<string[]> {
  parseDottedKey(key);

  let text = value;
  if (text === undefined) {
    const entered = await prompt(`Enter value for '${key}':`);
    if (entered === null) {
      throw new CommandError('Cancelled');
    }
    if (entered.length === 0) {
      throw new CommandError('No value entered');
    }
    text = entered;
  }

  store.set(key, Value.parseAs(kind, text));
  return [`✓ Set '${key}'`];
}

export function getCommand(store: CredentialStore, key: string): string[] {
  return [Value.display(store.get(key))];
}

export function removeCommand(store: CredentialStore, key: string): string[] {
  store.remove(key);
  return [`✓ Removed '${key}'`];
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

/**
 * Without a section: every `[section]` header followed by its key names.
 * With one: `section.key` lines for that section only.
 */
export function listCommand(store: CredentialStore, section?: string): string[] {
  if (section !== undefined) {
    const keys = store.listKeys(section);
    if (keys.length === 0) {
      throw new CommandError(`Section '${section}' not found or empty`);
    }
    return keys.map((key) => `  ${section}.${key}`);
  }

  const listing = store.listAll();
  if (listing.length === 0) {
    return ['No credentials configured yet.', "Run 'credkeep set <section>.<key>' to add one."];
  }

  const lines: string[] = [];
  for (const { section: name, keys } of listing) {
    lines.push(`[${name}]`);
    for (const key of keys) {
      lines.push(`  ${key}`);
    }
  }
  return lines;
}

// ---------------------------------------------------------------------------
// path
// ---------------------------------------------------------------------------

export function pathCommand(store: CredentialStore): string[] {
  return store.exists() ? [store.path()] : [`${store.path()} (not created yet)`];
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** One-line, user-facing description of a thrown error. */
export function formatError(err: unknown): string {
  if (isCredentialStoreError(err) || err instanceof CommandError) {
    return `✗ ${err.message}`;
  }
  const message = err instanceof Error ? err.message : String(err);
  return `✗ Unexpected error: ${message}`;
}
