import { Command, CommanderError, type Option } from 'commander';
import { createRequire } from 'node:module';
import { z } from 'zod';
import { createInitCommand } from './commands/init.js';
import { createWhichDbCommand } from './commands/which-db.js';
import { createTaskCommand } from './commands/task/index.js';
import { createQueueCommand } from './commands/queue/index.js';
import { createOnCommand } from './commands/on.js';
import { createOffCommand } from './commands/off.js';
import { createOffOnCommand } from './commands/offon.js';
import { createOnOffCommand } from './commands/onoff.js';
import { createSessionsCommand } from './commands/sessions/index.js';
import { createSendCommand } from './commands/send.js';
import { createRecallCommand } from './commands/recall.js';
import { createExternalsCommand } from './commands/externals.js';
import { createStatusCommand } from './commands/status.js';
import { createStagesCommand } from './commands/stages.js';
import { createProjectCommand } from './commands/project/index.js';
import { CLIError, ExitCode } from './errors.js';
import { getConfigPath, readConfig, resolveDbPath } from './config.js';
import { createErrorEnvelope, printJson, printTable } from './output.js';

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('../package.json'));

export interface UsageErrorDetails {
  received: string;
  reason: string;
  did_you_mean?: string[];
  examples: string[];
}

const UsageErrorDetailsSchema = z.object({
  did_you_mean: z.array(z.string()).optional(),
  examples: z.array(z.string()),
});

export function createProgram(): Command {
  const program = new Command();

  program
    .name('docket')
    .description('A personal work queue with one global timer and a lane for handed-off tasks.')
    .version(pkg.version)
    .option('--db <path>', 'Path to database file')
    .option('--format <format>', 'Output format: json or md', 'md');
  program.addHelpText(
    'after',
    `
Examples:
  docket task add --queue Write the release notes
  docket on
  docket send 3 alice waiting on review
  docket status
`
  );

  program.addCommand(createInitCommand());
  program.addCommand(createWhichDbCommand());
  program.addCommand(createTaskCommand());
  program.addCommand(createProjectCommand());
  program.addCommand(createQueueCommand());
  program.addCommand(createOnCommand());
  program.addCommand(createOffCommand());
  program.addCommand(createOffOnCommand());
  program.addCommand(createOnOffCommand());
  program.addCommand(createSessionsCommand());
  program.addCommand(createSendCommand());
  program.addCommand(createRecallCommand());
  program.addCommand(createExternalsCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createStagesCommand());

  return program;
}

/** `--format json` anywhere on the command line, before commander has parsed it. */
export function parseRequestedFormat(args: string[]): 'json' | 'md' {
  const formatIndex = args.indexOf('--format');
  if (formatIndex !== -1) {
    return args[formatIndex + 1] === 'json' ? 'json' : 'md';
  }
  const inline = args.find(arg => arg.startsWith('--format='));
  return inline === '--format=json' ? 'json' : 'md';
}

export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  const prev = new Array<number>(b.length + 1);
  const curr = new Array<number>(b.length + 1);
  for (let j = 0; j <= b.length; j += 1) prev[j] = j;

  for (let i = 1; i <= a.length; i += 1) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(curr[j - 1] + 1, prev[j] + 1, prev[j - 1] + cost);
    }
    for (let j = 0; j <= b.length; j += 1) prev[j] = curr[j];
  }

  return prev[b.length];
}

/** The one candidate sharing the prefix, or the single closest within two edits. */
export function pickUniqueBestMatch(token: string, candidates: string[], minLength = 2): string | null {
  if (token.length < minLength) {
    return null;
  }

  const prefixMatches = candidates.filter(candidate => candidate.startsWith(token));
  if (prefixMatches.length === 1) {
    return prefixMatches[0];
  }
  if (prefixMatches.length > 1) {
    return null;
  }

  const scored = candidates
    .map(candidate => ({ candidate, distance: editDistance(token, candidate) }))
    .filter(entry => entry.distance <= 2)
    .sort((left, right) => left.distance - right.distance);

  if (scored.length === 0) {
    return null;
  }
  if (scored.length > 1 && scored[0].distance === scored[1].distance) {
    return null;
  }
  return scored[0].candidate;
}

function findOption(command: Command, flag: string): Option | undefined {
  for (let cursor: Command | null = command; cursor; cursor = cursor.parent) {
    const option = cursor.options.find(candidate => candidate.long === flag || candidate.short === flag);
    if (option) return option;
  }
  return undefined;
}

/** The commands named by the leading non-option tokens. */
function resolveCommandPath(args: string[], program: Command): { tokens: string[]; command: Command } {
  const tokens: string[] = [];
  let current = program;
  let skipValue = false;
  for (const token of args) {
    if (skipValue) {
      skipValue = false;
      continue;
    }
    if (token === '--') break;
    if (token.startsWith('-')) {
      const option = findOption(current, token);
      skipValue = option !== undefined && option.required && !token.includes('=');
      continue;
    }
    const child = current.commands.find(command => command.name() === token);
    if (!child) break;
    tokens.push(token);
    current = child;
  }
  return { tokens, command: current };
}

function longFlags(command: Command): string[] {
  const flags: string[] = [];
  for (let cursor: Command | null = command; cursor; cursor = cursor.parent) {
    for (const option of cursor.options) {
      if (option.long) flags.push(option.long);
    }
  }
  return flags;
}

export function buildUsageError(args: string[], program: Command, rawMessage: string): CLIError {
  const message = rawMessage.replace(/^error:\s*/i, '').trim();
  const received = `docket ${args.join(' ')}`.trim();
  const context = resolveCommandPath(args, program);
  const prefix = context.tokens.length > 0 ? `${context.tokens.join(' ')} ` : '';

  const unknownCommand = /unknown command '([^']+)'/i.exec(message);
  if (unknownCommand) {
    const unknown = unknownCommand[1];
    const best = pickUniqueBestMatch(
      unknown,
      context.command.commands.map(command => command.name())
    );
    const details: UsageErrorDetails = {
      received,
      reason: `Unknown command '${unknown}'.`,
      did_you_mean: best ? [best] : undefined,
      examples: [best ? `docket ${prefix}${best} --help` : `docket ${prefix}--help`],
    };
    return new CLIError(`Unknown command '${unknown}'`, ExitCode.InvalidUsage, 'invalid_usage', details);
  }

  const unknownOption = /unknown option '([^']+)'/i.exec(message);
  if (unknownOption) {
    const unknown = unknownOption[1];
    const best = pickUniqueBestMatch(unknown, longFlags(context.command), 3);
    const details: UsageErrorDetails = {
      received,
      reason: `Unknown option '${unknown}'.`,
      did_you_mean: best ? [best] : undefined,
      examples: [`docket ${prefix}--help`],
    };
    return new CLIError(`Unknown option '${unknown}'`, ExitCode.InvalidUsage, 'invalid_usage', details);
  }

  const missingArgument = /missing required argument '([^']+)'/i.exec(message);
  if (missingArgument) {
    const details: UsageErrorDetails = {
      received,
      reason: `Required argument '${missingArgument[1]}' is missing.`,
      examples: [`docket ${prefix}--help`],
    };
    return new CLIError(
      `Missing required argument '${missingArgument[1]}'`,
      ExitCode.InvalidUsage,
      'invalid_usage',
      details
    );
  }

  return new CLIError(message || 'Invalid command usage', ExitCode.InvalidUsage, 'invalid_usage', {
    received,
    reason: message || 'Invalid command usage.',
    examples: ['docket --help'],
  } satisfies UsageErrorDetails);
}

function renderUsageError(error: CLIError, requestedFormat: 'json' | 'md'): never {
  if (requestedFormat === 'json') {
    console.log(JSON.stringify(createErrorEnvelope(error.code, error.message, error.details)));
    process.exit(error.exitCode);
  }

  console.error(`Error: ${error.message}`);
  const details = UsageErrorDetailsSchema.safeParse(error.details);
  if (details.success) {
    if (details.data.did_you_mean && details.data.did_you_mean.length > 0) {
      console.error(`Did you mean: ${details.data.did_you_mean.join(', ')}`);
    }
    for (const example of details.data.examples) {
      console.error(`Try: ${example}`);
    }
  }
  process.exit(error.exitCode);
}

function applyCommanderOverrides(command: Command): void {
  command.exitOverride();
  command.configureOutput({
    writeErr: () => {},
  });

  for (const child of command.commands) {
    applyCommanderOverrides(child);
  }
}

export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  applyCommanderOverrides(program);

  const args = argv.slice(2);
  const requestedFormat = parseRequestedFormat(args);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode !== ExitCode.Success) {
        renderUsageError(buildUsageError(args, program, error.message), requestedFormat);
      }
      return;
    }

    throw error;
  }
}

export { CLIError, ExitCode, getConfigPath, readConfig, resolveDbPath, printJson, printTable };
