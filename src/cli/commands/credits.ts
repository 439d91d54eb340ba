import { Command } from 'commander';
import chalk from 'chalk';

const LIBRARIES = [
  { name: 'commander', purpose: 'command-line interface' },
  { name: 'chalk', purpose: 'terminal colors' },
  { name: 'zod', purpose: 'configuration validation' },
  { name: 'yaml', purpose: 'configuration files' },
  { name: 'fast-glob', purpose: 'file patterns' },
];

export function createCreditsCommand(version: string): Command {
  return new Command('credits')
    .description('Show project credits')
    .action(() => {
      console.log(getCredits(version));
    });
}

export function getCredits(version: string): string {
  const lines: string[] = [
    '',
    `${chalk.bold('ufw-rules')} v${version}`,
    'A parser and checker for ufw-style firewall rules.',
    '',
    chalk.cyan('Built with:'),
  ];

  for (const lib of LIBRARIES) {
    lines.push(`  ${chalk.yellow(lib.name.padEnd(12))} ${lib.purpose}`);
  }

  lines.push('');
  return lines.join('\n');
}
