import type { Command } from 'commander';
import type { CliContext, GlobalOptions } from '../cli/shared.js';
import {
  context,
  formality,
  glossaryId,
  ignoreTags,
  preserveFormatting,
  showBilledCharacters,
  sourceLang,
  splitSentences,
  type TranslateOption,
  tagHandling,
} from '../lib/deepl-options.js';

export interface TranslateCommandOptions {
  to: string;
  from?: string;
  formality?: string;
  splitSentences?: string;
  preserveFormatting?: boolean;
  tagHandling?: string;
  ignoreTags?: string;
  glossary?: string;
  context?: string;
  showBilledCharacters?: boolean;
  json?: boolean;
}

/**
 * Maps command flags to translate options, in a fixed order.
 */
export function buildTranslateOptions(cmdOpts: Omit<TranslateCommandOptions, 'to' | 'json'>): TranslateOption[] {
  const options: TranslateOption[] = [];

  if (cmdOpts.from) {
    options.push(sourceLang(cmdOpts.from.toUpperCase()));
  }
  if (cmdOpts.formality) {
    options.push(formality(cmdOpts.formality));
  }
  if (cmdOpts.splitSentences !== undefined) {
    options.push(splitSentences(cmdOpts.splitSentences));
  }
  if (cmdOpts.preserveFormatting) {
    options.push(preserveFormatting(true));
  }
  if (cmdOpts.tagHandling) {
    options.push(tagHandling(cmdOpts.tagHandling));
  }
  if (cmdOpts.ignoreTags) {
    const tags = cmdOpts.ignoreTags
      .split(',')
      .map((tag) => tag.trim())
      .filter(Boolean);
    options.push(ignoreTags(...tags));
  }
  if (cmdOpts.glossary) {
    options.push(glossaryId(cmdOpts.glossary));
  }
  if (cmdOpts.context) {
    options.push(context(cmdOpts.context));
  }
  if (cmdOpts.showBilledCharacters) {
    options.push(showBilledCharacters(true));
  }

  return options;
}

export function registerTranslateCommands(program: Command, ctx: CliContext): void {
  program
    .command('translate')
    .description('Translate one or more texts')
    .argument('<text...>', 'Text(s) to translate; each argument is translated separately')
    .requiredOption('--to <lang>', 'Target language code (e.g. DE, EN-GB)')
    .option('--from <lang>', 'Source language code; detected when omitted')
    .option('--formality <level>', 'Formality: default, less, more')
    .option('--split-sentences <mode>', 'Sentence splitting: 0, 1, nonewlines')
    .option('--preserve-formatting', 'Keep the original formatting')
    .option('--tag-handling <strategy>', 'Tag handling: default, xml, html')
    .option('--ignore-tags <tags>', 'Comma-separated tags whose content is not translated')
    .option('--glossary <id>', 'Glossary to apply')
    .option('--context <text>', 'Context that informs the translation')
    .option('--show-billed-characters', 'Report billed characters per text')
    .option('--json', 'Output as JSON')
    .action(async (texts: string[], cmdOpts: TranslateCommandOptions) => {
      const client = ctx.createClientFromOptions(program.opts<GlobalOptions>());
      if (!client) {
        return;
      }

      try {
        const translations = await client.translateMany(
          texts,
          cmdOpts.to.toUpperCase(),
          ...buildTranslateOptions(cmdOpts),
        );

        if (cmdOpts.json) {
          console.log(JSON.stringify(translations, null, 2));
          return;
        }

        if (translations.length === 0) {
          console.error(`${ctx.p('warn')}DeepL returned no translations.`);
          return;
        }

        for (const translation of translations) {
          console.log(translation.text);
          const billed =
            translation.billedCharacters === undefined ? '' : `, ${translation.billedCharacters} billed characters`;
          console.error(`${ctx.p('info')}Detected ${translation.detectedSourceLanguage}${billed}`);
        }
      } catch (error) {
        ctx.reportError('Translation failed', error);
      }
    });
}
