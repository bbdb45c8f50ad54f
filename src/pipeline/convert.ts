import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { pipeline } from 'stream/promises';
import { DEFAULT_RULES } from '../transform/rules.js';
import type { TransformRules } from '../transform/rules.js';
import { splitTokens } from '../transform/line.js';
import { transformToken } from '../transform/token.js';
import { ConverterError, ConverterErrorCode, describeCause } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { readLines } from './lines.js';

export type SourceEncoding = 'utf8' | 'ascii' | 'latin1';

export interface ConvertOptions {
  rules?: TransformRules;
  encoding?: SourceEncoding;
}

export interface ConversionResult {
  source: string;
  destination: string;
  lines: number;
  tokens: number;
}

async function openHandle(
  filePath: string,
  flags: 'r' | 'w',
  code: ConverterErrorCode
): Promise<FileHandle> {
  try {
    return await fs.open(filePath, flags);
  } catch (err) {
    const action = flags === 'r' ? 'open source' : 'create destination';
    throw new ConverterError(code, `Cannot ${action}: ${filePath}`, {
      path: filePath,
      ...describeCause(err),
    });
  }
}

// Opening the destination with 'w' would truncate the source before it is read.
async function assertDistinct(input: FileHandle, source: string, destination: string): Promise<void> {
  // A destination that cannot be stat'ed is left for the open to report.
  const existing = await fs.stat(destination).catch(() => null);
  if (existing === null) return;
  const opened = await input.stat();
  if (existing.dev === opened.dev && existing.ino === opened.ino) {
    throw new ConverterError(
      ConverterErrorCode.DESTINATION_UNWRITABLE,
      `Destination is the source file: ${destination}`,
      { path: destination, source }
    );
  }
}

/**
 * Converts `source` line by line into `destination`, which is truncated first.
 *
 * Lines are written in input order as soon as they are transformed. On a
 * STREAM_INTERRUPTED failure the destination holds whatever was written
 * before the failure and must be treated as incomplete. A destination that
 * names the source file itself (directly or through a link) is refused with
 * DESTINATION_UNWRITABLE before anything is truncated.
 */
export async function convertFile(
  source: string,
  destination: string,
  options: ConvertOptions = {}
): Promise<ConversionResult> {
  const rules = options.rules ?? DEFAULT_RULES;
  const encoding = options.encoding ?? 'utf8';

  const input = await openHandle(source, 'r', ConverterErrorCode.SOURCE_UNREADABLE);
  const output = await assertDistinct(input, source, destination)
    .then(() => openHandle(destination, 'w', ConverterErrorCode.DESTINATION_UNWRITABLE))
    .catch(async (err: unknown) => {
      await input.close();
      throw err;
    });

  logger.debug({ source, destination }, 'Conversion started');

  const result: ConversionResult = { source, destination, lines: 0, tokens: 0 };
  const reader = input.createReadStream({ encoding });

  try {
    await pipeline(
      reader,
      readLines,
      async function* (rows: AsyncIterable<string>) {
        for await (const row of rows) {
          const tokens = splitTokens(row);
          result.lines += 1;
          result.tokens += tokens.length;
          yield `${tokens.map(token => transformToken(token, rules)).join(' ')}\n`;
        }
      },
      output.createWriteStream({ encoding })
    );
  } catch (err) {
    throw new ConverterError(
      ConverterErrorCode.STREAM_INTERRUPTED,
      `Conversion interrupted after ${result.lines} line(s) read: ${source} -> ${destination}`,
      { source, destination, linesRead: result.lines, ...describeCause(err) }
    );
  } finally {
    reader.destroy();
    await Promise.all([input.close(), output.close()]);
  }

  logger.info(result, 'Conversion complete');
  return result;
}
