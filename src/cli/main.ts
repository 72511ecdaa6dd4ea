#!/usr/bin/env node
import { Command, Option } from 'commander';
import { isCancel, password } from '@clack/prompts';

import {
  formatError,
  getCommand,
  listCommand,
  pathCommand,
  removeCommand,
  setCommand,
  type SecretPrompt,
} from '../app/commands.js';
import { VALUE_KINDS, type ValueKind } from '../models/value.js';
import { CredentialStore } from '../store/credential-store.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function run(fn: (store: CredentialStore) => string[] | Promise<string[]>): Promise<void> {
  try {
    const store = new CredentialStore({ path: program.opts<{ file?: string }>().file });
    const lines = await fn(store);
    for (const line of lines) {
      console.log(line);
    }
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  }
}

const promptSecret: SecretPrompt = async (message) => {
  const value = await password({ message });
  return isCancel(value) ? null : value;
};

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('credkeep')
  .description('Local credential store: keep secrets out of your project tree')
  .version('0.1.0')
  .option('-f, --file <path>', 'credentials file (overrides CREDKEEP_FILE)');

program
  .command('set <key> [value]')
  .description('Set a credential (prompts without echo when value is omitted)')
  .addOption(
    new Option('-t, --type <kind>', 'value type').choices(VALUE_KINDS).default('string'),
  )
  .action(async (key: string, value: string | undefined, opts: { type: ValueKind }) => {
    await run((store) => setCommand(store, key, value, opts.type, promptSecret));
  });

program
  .command('get <key>')
  .description('Print a credential value')
  .action(async (key: string) => {
    await run((store) => getCommand(store, key));
  });

program
  .command('list [section]')
  .description('List sections and key names (values are never shown)')
  .action(async (section: string | undefined) => {
    await run((store) => listCommand(store, section));
  });

program
  .command('remove <key>')
  .description('Remove a credential')
  .action(async (key: string) => {
    await run((store) => removeCommand(store, key));
  });

program
  .command('path')
  .description('Show the credentials file path')
  .action(async () => {
    await run((store) => pathCommand(store));
  });

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

await program.parseAsync(process.argv);
