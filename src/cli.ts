#!/usr/bin/env node
import { parseArgs } from 'util';
import { loadConfig, rulesFromConfig } from './config/loader.js';
import { convertFile } from './pipeline/convert.js';
import { ConverterError } from './shared/errors.js';
import { logger } from './shared/logger.js';

export const USAGE = 'Usage: pig-latin [--config <path>] <source> <destination>';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

type CliArgs =
  | { kind: 'help' }
  | { kind: 'convert'; source: string; destination: string; configPath?: string }
  | { kind: 'invalid'; reason: string };

export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv);
  } catch (err) {
    return { kind: 'invalid', reason: err instanceof Error ? err.message : String(err) };
  }
  if (parsed.values.help) return { kind: 'help' };

  const [source, destination, ...extra] = parsed.positionals;
  if (source === undefined || destination === undefined) {
    return { kind: 'invalid', reason: 'Expected a source and a destination path' };
  }
  if (extra.length > 0) {
    return { kind: 'invalid', reason: `Unexpected argument: ${extra[0]}` };
  }
  return { kind: 'convert', source, destination, configPath: parsed.values.config };
}

function parseOptions(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

export async function main(argv: string[]): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.kind === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return EXIT_OK;
  }
  if (args.kind === 'invalid') {
    process.stderr.write(`${args.reason}\n${USAGE}\n`);
    return EXIT_USAGE;
  }

  try {
    const { config, configPath, fromFile } = loadConfig(args.configPath);
    if (config.log_level && !process.env['LOG_LEVEL']) {
      logger.level = config.log_level;
    }
    logger.debug({ configPath, fromFile }, 'Using configuration');

    await convertFile(args.source, args.destination, {
      rules: rulesFromConfig(config),
      encoding: config.encoding,
    });
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ConverterError) {
      logger.error({ code: err.code, ...err.context }, err.message);
      process.stderr.write(`pig-latin: ${err.message}\n`);
      return EXIT_FAILURE;
    }
    throw err;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.fatal({ err }, 'Unexpected failure');
      process.exitCode = EXIT_FAILURE;
    }
  );
}
