import { readFile } from 'node:fs/promises';
import type { Command } from 'commander';
import type { CliContext, GlobalOptions } from '../cli/shared.js';
import type { Glossary } from '../lib/deepl-types.js';
import { decodeGlossaryEntries, encodeGlossaryEntries } from '../lib/glossary-tsv.js';

export function formatGlossaryLine(glossary: Glossary): string {
  const status = glossary.ready ? 'ready' : 'pending';
  return [
    glossary.glossaryId,
    glossary.name,
    `${glossary.sourceLang}→${glossary.targetLang}`,
    `${glossary.entryCount} entries`,
    status,
    glossary.creationTime.toISOString(),
  ].join('  ');
}

export function registerGlossaryCommands(program: Command, ctx: CliContext): void {
  const glossary = program.command('glossary').description('Manage DeepL glossaries');

  glossary
    .command('list')
    .description('List all glossaries')
    .option('--json', 'Output as JSON')
    .action(async (cmdOpts: { json?: boolean }) => {
      const client = ctx.createClientFromOptions(program.opts<GlobalOptions>());
      if (!client) {
        return;
      }

      try {
        const glossaries = await client.listGlossaries();
        if (cmdOpts.json) {
          console.log(JSON.stringify(glossaries, null, 2));
        } else if (glossaries.length === 0) {
          console.error(`${ctx.p('info')}No glossaries found.`);
        } else {
          for (const item of glossaries) {
            console.log(formatGlossaryLine(item));
          }
        }
      } catch (error) {
        ctx.reportError('Failed to list glossaries', error);
      }
    });

  glossary
    .command('get')
    .description('Show one glossary')
    .argument('<glossary-id>', 'Glossary ID')
    .option('--json', 'Output as JSON')
    .action(async (glossaryId: string, cmdOpts: { json?: boolean }) => {
      const client = ctx.createClientFromOptions(program.opts<GlobalOptions>());
      if (!client) {
        return;
      }

      try {
        const item = await client.getGlossary(glossaryId);
        console.log(cmdOpts.json ? JSON.stringify(item, null, 2) : formatGlossaryLine(item));
      } catch (error) {
        ctx.reportError('Failed to fetch glossary', error);
      }
    });

  glossary
    .command('entries')
    .description('Print the entries of a glossary as TSV')
    .argument('<glossary-id>', 'Glossary ID')
    .option('--json', 'Output as JSON')
    .action(async (glossaryId: string, cmdOpts: { json?: boolean }) => {
      const client = ctx.createClientFromOptions(program.opts<GlobalOptions>());
      if (!client) {
        return;
      }

      try {
        const entries = await client.listGlossaryEntries(glossaryId);
        console.log(cmdOpts.json ? JSON.stringify(entries, null, 2) : encodeGlossaryEntries(entries));
      } catch (error) {
        ctx.reportError('Failed to fetch glossary entries', error);
      }
    });

  glossary
    .command('create')
    .description('Create a glossary from a TSV file (source<TAB>target per line)')
    .argument('<name>', 'Glossary name')
    .requiredOption('--from <lang>', 'Source language code')
    .requiredOption('--to <lang>', 'Target language code')
    .requiredOption('--entries <file>', 'Path to the TSV entries file')
    .action(async (name: string, cmdOpts: { from: string; to: string; entries: string }) => {
      const client = ctx.createClientFromOptions(program.opts<GlobalOptions>());
      if (!client) {
        return;
      }

      try {
        const entries = decodeGlossaryEntries(await readFile(cmdOpts.entries, 'utf8'));
        const created = await client.createGlossary(
          name,
          cmdOpts.from.toUpperCase(),
          cmdOpts.to.toUpperCase(),
          entries,
        );
        console.log(created.glossaryId);
        console.error(`${ctx.p('ok')}Created glossary "${created.name}" with ${created.entryCount} entries.`);
      } catch (error) {
        ctx.reportError('Failed to create glossary', error);
      }
    });

  glossary
    .command('delete')
    .description('Delete a glossary')
    .argument('<glossary-id>', 'Glossary ID')
    .action(async (glossaryId: string) => {
      const client = ctx.createClientFromOptions(program.opts<GlobalOptions>());
      if (!client) {
        return;
      }

      try {
        await client.deleteGlossary(glossaryId);
        console.error(`${ctx.p('ok')}Deleted glossary ${glossaryId}.`);
      } catch (error) {
        ctx.reportError('Failed to delete glossary', error);
      }
    });
}
