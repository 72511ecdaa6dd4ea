import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  CommandError,
  formatError,
  getCommand,
  listCommand,
  pathCommand,
  removeCommand,
  setCommand,
  type SecretPrompt,
} from './commands.js';
import { InvalidKeyError, InvalidValueError, KeyNotFoundError } from '../errors.js';
import { Value } from '../models/value.js';
import { CredentialStore } from '../store/credential-store.js';

const noPrompt: SecretPrompt = async () => {
  throw new Error('prompt should not be called');
};

describe('CLI commands', () => {
  let tmpDir: string;
  let file: string;
  let store: CredentialStore;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'credkeep-cli-'));
    file = path.join(tmpDir, 'credentials.toml');
    store = new CredentialStore({ path: file });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  // -----------------------------------------------------------------------
  // set
  // -----------------------------------------------------------------------

  describe('setCommand', () => {
    it('stores a value given on the command line as a string', async () => {
      const out = await setCommand(store, 'db.user', 'alice', 'string', noPrompt);

      expect(out).toEqual(["✓ Set 'db.user'"]);
      expect(store.get('db.user')).toEqual({ kind: 'string', value: 'alice' });
    });

    it('parses the value as the requested kind', async () => {
      await setCommand(store, 'db.port', '5432', 'integer', noPrompt);
      await setCommand(store, 'db.ssl', 'true', 'boolean', noPrompt);

      expect(store.get('db.port')).toEqual({ kind: 'integer', value: 5432 });
      expect(store.get('db.ssl')).toEqual({ kind: 'boolean', value: true });
    });

    it('rejects text that does not match the kind', async () => {
      await expect(setCommand(store, 'db.port', 'abc', 'integer', noPrompt)).rejects.toThrow(
        InvalidValueError,
      );
      expect(store.exists()).toBe(false);
    });

    it('prompts for the value when it is omitted', async () => {
      const prompt = vi.fn<SecretPrompt>(async () => 'hidden-value');

      const out = await setCommand(store, 'db.password', undefined, 'string', prompt);

      expect(prompt).toHaveBeenCalledWith("Enter value for 'db.password':");
      expect(out).toEqual(["✓ Set 'db.password'"]);
      expect(store.get('db.password')).toEqual({ kind: 'string', value: 'hidden-value' });
    });

    it('fails when the prompt is cancelled', async () => {
      await expect(
        setCommand(store, 'db.password', undefined, 'string', async () => null),
      ).rejects.toThrow(new CommandError('Cancelled'));
      expect(store.exists()).toBe(false);
    });

    it('fails when nothing was entered', async () => {
      await expect(
        setCommand(store, 'db.password', undefined, 'string', async () => ''),
      ).rejects.toThrow('No value entered');
    });

    it('validates the key before prompting', async () => {
      const prompt = vi.fn<SecretPrompt>(async () => 'never-used');

      await expect(setCommand(store, 'nodot', undefined, 'string', prompt)).rejects.toThrow(
        InvalidKeyError,
      );
      expect(prompt).not.toHaveBeenCalled();
    });
  });

  // -----------------------------------------------------------------------
  // get / remove
  // -----------------------------------------------------------------------

  describe('getCommand', () => {
    it('prints the plain value', () => {
      store.set('db.password', 's3cret');
      expect(getCommand(store, 'db.password')).toEqual(['s3cret']);
    });

    it('prints integral floats with a fraction', () => {
      store.set('n.ratio', Value.float(1));
      expect(getCommand(store, 'n.ratio')).toEqual(['1.0']);
    });

    it('throws KeyNotFound for a missing key', () => {
      expect(() => getCommand(store, 'db.nope')).toThrow(KeyNotFoundError);
    });
  });

  describe('removeCommand', () => {
    it('removes the key and confirms', () => {
      store.set('db.user', 'alice');

      expect(removeCommand(store, 'db.user')).toEqual(["✓ Removed 'db.user'"]);
      expect(store.listKeys('db')).toEqual([]);
    });

    it('throws KeyNotFound for a missing key', () => {
      expect(() => removeCommand(store, 'db.user')).toThrow(KeyNotFoundError);
    });
  });

  // -----------------------------------------------------------------------
  // list
  // -----------------------------------------------------------------------

  describe('listCommand', () => {
    it('prints a hint when nothing is stored', () => {
      expect(listCommand(store)).toEqual([
        'No credentials configured yet.',
        "Run 'credkeep set <section>.<key>' to add one.",
      ]);
    });

    it('prints every section header with indented keys', () => {
      store.set('b.x', '1');
      store.set('a.y', '2');
      store.set('a.z', '3');

      expect(listCommand(store)).toEqual(['[b]', '  x', '[a]', '  y', '  z']);
    });

    it('prints empty sections as bare headers', () => {
      store.set('a.only', 'v');
      store.remove('a.only');

      expect(listCommand(store)).toEqual(['[a]']);
    });

    it('prints dotted keys for one section', () => {
      store.set('db.user', 'alice');
      store.set('db.password', 's3cret');

      expect(listCommand(store, 'db')).toEqual(['  db.user', '  db.password']);
    });

    it('fails for a missing or empty section', () => {
      expect(() => listCommand(store, 'nope')).toThrow("Section 'nope' not found or empty");
    });

    it('never prints values', () => {
      store.set('db.password', 's3cret');
      expect(listCommand(store)).toEqual(['[db]', '  password']);
    });
  });

  // -----------------------------------------------------------------------
  // path
  // -----------------------------------------------------------------------

  describe('pathCommand', () => {
    it('marks a file that does not exist yet', () => {
      expect(pathCommand(store)).toEqual([`${file} (not created yet)`]);
    });

    it('prints the bare path once the file exists', () => {
      store.set('db.user', 'alice');
      expect(pathCommand(store)).toEqual([file]);
    });
  });
});

describe('formatError', () => {
  it('prints store errors as a single line', () => {
    expect(formatError(new KeyNotFoundError('db.user'))).toBe("✗ Key 'db.user' not found");
  });

  it('prints command errors as a single line', () => {
    expect(formatError(new CommandError('Cancelled'))).toBe('✗ Cancelled');
  });

  it('labels anything else as unexpected', () => {
    expect(formatError(new Error('boom'))).toBe('✗ Unexpected error: boom');
    expect(formatError('plain')).toBe('✗ Unexpected error: plain');
  });
});
