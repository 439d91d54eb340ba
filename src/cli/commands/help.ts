/**
 * Rules-language help by topic.
 * - `help` lists topics
 * - `help <topic>` shows the topic's syntax and examples
 * - `help --full` shows every topic
 */
import { Command } from 'commander';
import chalk from 'chalk';

interface HelpTopic {
  description: string;
  entries: Array<{
    syntax: string;
    summary: string;
  }>;
  examples?: string[];
  seeAlso?: string[];
}

const TOPICS: Record<string, HelpTopic> = {
  syntax: {
    description: 'Rule forms, clauses and comments',
    entries: [
      { syntax: '<action> <service>', summary: 'Service rule: allow, deny, reject or limit a named service' },
      { syntax: '<action> [in|out] [on <iface>] <clause>...', summary: 'Address rule: at least one clause is required' },
      { syntax: 'from <addr>', summary: 'Source address' },
      { syntax: 'to <addr>', summary: 'Destination address' },
      { syntax: 'port <n>', summary: 'Port number, 0-65535' },
      { syntax: 'proto <tcp|udp|any>', summary: 'Protocol' },
      { syntax: '# text', summary: 'Comment, alone on a line or after a rule' },
    ],
    examples: ['allow ssh', 'deny in on eth0 from any port 22 proto tcp  # no ssh on eth0'],
    seeAlso: ['addresses', 'examples'],
  },
  addresses: {
    description: 'Address keywords, IPv4 and IPv6 with optional prefix length',
    entries: [
      { syntax: 'any | internal | external', summary: 'Address keywords' },
      { syntax: 'a.b.c.d[/n]', summary: 'IPv4, octets 0-255, prefix length 0-32' },
      { syntax: 'x:x::x[/n]', summary: 'IPv6, at most one "::", prefix length 0-128' },
    ],
    examples: ['allow from 192.168.0.0/16', 'deny to fe80::/10', 'allow from ::ffff:10.0.0.1'],
    seeAlso: ['syntax'],
  },
  examples: {
    description: 'Complete rules files',
    entries: [
      { syntax: 'allow ssh', summary: 'One service rule' },
      { syntax: 'allow in on eth0 from internal port 443 proto tcp', summary: 'Every clause kind' },
      { syntax: 'limit out to 8.8.8.8 port 53 proto udp', summary: 'Outbound DNS' },
    ],
    examples: ['ufw-rules parse rules.txt --format human', 'ufw-rules check "rules/**/*.rules"'],
    seeAlso: ['syntax', 'addresses'],
  },
};

export function createHelpCommand(): Command {
  return new Command('help')
    .description('Show rules-language help by topic')
    .argument('[topic]', 'Topic to show help for')
    .option('--full', 'Show every topic')
    .action((topic: string | undefined, options: { full?: boolean }) => {
      if (options.full) {
        showFullHelp();
      } else if (topic) {
        showTopicHelp(topic);
      } else {
        showTopicList();
      }
    });
}

function showTopicList(): void {
  const lines: string[] = ['', chalk.bold('ufw-rules Help Topics'), ''];

  for (const [name, topic] of Object.entries(TOPICS)) {
    lines.push(`  ${chalk.yellow(name.padEnd(12))} ${topic.description}`);
  }

  lines.push('');
  lines.push(chalk.dim('Usage:'));
  lines.push(`  ${chalk.cyan('ufw-rules help <topic>')}     Show one topic`);
  lines.push(`  ${chalk.cyan('ufw-rules help --full')}      Show every topic`);
  lines.push('');

  console.log(lines.join('\n'));
}

function renderTopic(name: string, topic: HelpTopic): string[] {
  const lines: string[] = [
    chalk.bold(name.charAt(0).toUpperCase() + name.slice(1)),
    chalk.dim(topic.description),
    '',
  ];

  for (const entry of topic.entries) {
    lines.push(`  ${chalk.yellow(entry.syntax.padEnd(44))} ${entry.summary}`);
  }

  if (topic.examples && topic.examples.length > 0) {
    lines.push('');
    for (const example of topic.examples) {
      lines.push(`    ${chalk.dim('→')} ${chalk.cyan(example)}`);
    }
  }

  return lines;
}

function showTopicHelp(topicName: string): void {
  const name = topicName.toLowerCase();
  const topic = TOPICS[name];

  if (!topic) {
    console.error(chalk.red(`Unknown topic: ${topicName}`));
    console.error(`Available topics: ${Object.keys(TOPICS).join(', ')}`);
    process.exit(1);
  }

  const lines = ['', ...renderTopic(name, topic)];

  if (topic.seeAlso && topic.seeAlso.length > 0) {
    lines.push('');
    lines.push(chalk.dim(`See also: ${topic.seeAlso.map((t) => `help ${t}`).join(', ')}`));
  }

  lines.push('');
  console.log(lines.join('\n'));
}

function showFullHelp(): void {
  const lines: string[] = [''];

  for (const [name, topic] of Object.entries(TOPICS)) {
    lines.push(...renderTopic(name, topic), '');
  }

  lines.push(chalk.dim("Run 'ufw-rules <command> --help' for command-specific options"));
  lines.push('');

  console.log(lines.join('\n'));
}

/** Overview shown by `ufw-rules --help`. */
export function getOverviewHelp(version: string): string {
  const lines: string[] = [
    '',
    `${chalk.bold('ufw-rules')} v${version} - Parse and check firewall rules files`,
    '',
    chalk.cyan('Commands:'),
    `  ${chalk.yellow('parse <files...>'.padEnd(20))} Print the parsed rules (debug, json or human)`,
    `  ${chalk.yellow('check <files...>'.padEnd(20))} Report which files parse`,
    `  ${chalk.yellow('help [topic]'.padEnd(20))} Rules-language help`,
    `  ${chalk.yellow('credits'.padEnd(20))} Project credits`,
    '',
    chalk.cyan('Global options:'),
    `  ${'--verbose'.padEnd(20)} Debug logging`,
    `  ${'--quiet'.padEnd(20)} Errors only`,
    `  ${'-V, --version'.padEnd(20)} Print the version`,
    '',
  ];

  return lines.join('\n');
}
