import { z } from 'zod';
import type { SpiderConfigInput } from '../config/spider-config.js';

type ParsedArgs = {
  command: string;
  positionals: string[];
  options: Record<string, string>;
};

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    positionals: z.array(z.string()),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('run'),
    positionals: z.array(z.string()),
    options: z.record(z.string(), z.string()),
  }),
]);

const numberFromCli = (message: string, min: number) =>
  z.preprocess(
    (value) => {
      if (typeof value === 'string') {
        const parsedValue = Number(value);
        return Number.isFinite(parsedValue) ? parsedValue : value;
      }

      return value;
    },
    z.number({ invalid_type_error: message }).int(message).min(min, message),
  );

const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);

const runArgsSchema = z.object({
  module: z.string().trim().min(1, 'Missing required argument: <module>'),
  workers: numberFromCli('Invalid --workers. Provide a positive integer.', 1).optional(),
  downloadDelay: numberFromCli(
    'Invalid --downloadDelay. Provide milliseconds >= 0.',
    0,
  ).optional(),
  retryTimes: numberFromCli('Invalid --retryTimes. Provide an integer >= 0.', 0).optional(),
  retryDelay: numberFromCli('Invalid --retryDelay. Provide milliseconds >= 0.', 0).optional(),
  timeout: numberFromCli('Invalid --timeout. Provide milliseconds > 0.', 1).optional(),
  logLevel: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      logLevelSchema,
    )
    .optional(),
});

type RunArgs = z.infer<typeof runArgsSchema>;

function normalizeCommand(command?: string): string {
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    return 'help';
  }

  return command;
}

/**
 * `<command> [positionals...] [--key=value | --key value | --flag]`.
 */
function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const positionals: string[] = [];
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (arg === undefined) {
      continue;
    }

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, positionals, options };
}

function toConfigInput(args: RunArgs): SpiderConfigInput {
  return {
    ...(args.workers !== undefined ? { workers: args.workers } : {}),
    ...(args.downloadDelay !== undefined ? { downloadDelayMs: args.downloadDelay } : {}),
    ...(args.retryTimes !== undefined ? { retryTimes: args.retryTimes } : {}),
    ...(args.retryDelay !== undefined ? { retryDelayMs: args.retryDelay } : {}),
    ...(args.timeout !== undefined ? { timeoutMs: args.timeout } : {}),
  };
}

export { cliInputSchema, normalizeCommand, parseArgs, runArgsSchema, toConfigInput };
export type { ParsedArgs, RunArgs };
