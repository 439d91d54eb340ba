import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createCheckCommand } from './commands/check.js';
import { createCreditsCommand } from './commands/credits.js';
import { createHelpCommand, getOverviewHelp } from './commands/help.js';
import { createParseCommand } from './commands/parse.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageJsonSchema = z.object({ version: z.string() });

export const VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))
).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('ufw-rules')
    .description('Parse and check ufw-style firewall rules files')
    .version(VERSION)
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Errors only')
    .helpCommand(false)
    .configureHelp({
      formatHelp: () => getOverviewHelp(VERSION),
    });

  program.addCommand(createParseCommand());
  program.addCommand(createCheckCommand());
  program.addCommand(createHelpCommand());
  program.addCommand(createCreditsCommand(VERSION));

  return program;
}
