import { Command } from 'commander';
import { registerGlossaryCommands } from '../commands/glossary.js';
import { registerTranslateCommands } from '../commands/translate.js';
import { createCliContext } from './shared.js';

export const CLI_VERSION = '0.1.0';

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('deepl-lite')
    .description('Translate text and manage glossaries with the DeepL API')
    .version(CLI_VERSION)
    .option('--auth-key <key>', 'DeepL auth key (default: $DEEPL_AUTH_KEY)')
    .option('--base-url <url>', 'API base URL (default: $DEEPL_API_ENDPOINT, or derived from the key)')
    .option('--timeout <ms>', 'Request timeout in milliseconds (default: $DEEPL_TIMEOUT_MS)')
    .option('--plain', 'Plain text prefixes instead of emoji');

  const ctx = createCliContext(program, env);
  registerTranslateCommands(program, ctx);
  registerGlossaryCommands(program, ctx);

  return program;
}
