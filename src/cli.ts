import path from 'node:path';

import { Command } from 'commander';

import { RulesAnonymizer } from './anonymizers/RulesAnonymizer.js';
import { HAR_CREATOR_VERSION } from './constants.js';
import {
  fromArchive,
  parseArchiveText,
  serializeArchive,
  toArchive,
} from './har/archive.js';
import type { HarEntry } from './har/schema.js';
import { readFileIfExists, writeFileAtomic } from './utils/fileUtils.js';

async function readArchive(file: string) {
  const filePath = path.resolve(process.cwd(), file);
  const text = await readFileIfExists(filePath);
  if (text === null) {
    throw new Error(`File not found: ${filePath}`);
  }
  return { filePath, archive: parseArchiveText(text, filePath) };
}

export function formatEntry(entry: HarEntry, index: number): string {
  const { request, response } = entry;
  return `#${index + 1} ${response.status} ${request.method} ${request.url} (${entry.time.toFixed(1)} ms)`;
}

async function inspectCommand(file: string): Promise<void> {
  const { filePath, archive } = await readArchive(file);
  const { entries, creator, version } = archive.log;

  console.log(
    `${filePath}: ${entries.length} entries (HAR ${version}, ${creator.name} ${creator.version})`,
  );
  entries.forEach((entry, index) => console.log(formatEntry(entry, index)));
}

async function anonymizeCommand(file: string, options: { out?: string }): Promise<void> {
  const { filePath, archive } = await readArchive(file);
  const interaction = await RulesAnonymizer.default.anonymize({
    name: path.basename(filePath),
    messages: fromArchive(archive, filePath),
  });

  const outPath = path.resolve(process.cwd(), options.out ?? file);
  await writeFileAtomic(outPath, serializeArchive(toArchive(interaction)));
  console.log(`Anonymized ${interaction.messages.length} entries to ${outPath}`);
}

function withErrorExit<A extends unknown[]>(
  action: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args) => {
    try {
      await action(...args);
    } catch (error) {
      if (!(error instanceof Error)) {
        throw error;
      }
      console.error(`Error: ${error.message}`);
      process.exitCode = 1;
    }
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('http-recorder')
    .description('Inspect and maintain recorded HTTP interaction archives')
    .version(HAR_CREATOR_VERSION);

  program
    .command('inspect')
    .description('Validate an archive and list its entries')
    .argument('<file>', 'HAR file to read (relative to CWD)')
    .action(withErrorExit(inspectCommand));

  program
    .command('anonymize')
    .description('Rewrite an archive through the default anonymizer')
    .argument('<file>', 'HAR file to anonymize (relative to CWD)')
    .option('-o, --out <path>', 'Write to this file instead of in place')
    .action(withErrorExit(anonymizeCommand));

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
