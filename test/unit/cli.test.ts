import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { main, parseCliArgs, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from '../../src/cli.js';
import { logger } from '../../src/shared/logger.js';

describe('parseCliArgs', () => {
  it('reads source and destination', () => {
    expect(parseCliArgs(['in.txt', 'out.txt'])).toEqual({
      kind: 'convert',
      source: 'in.txt',
      destination: 'out.txt',
      configPath: undefined,
    });
  });

  it('reads --config', () => {
    expect(parseCliArgs(['--config', 'c.yaml', 'in.txt', 'out.txt'])).toMatchObject({
      kind: 'convert',
      configPath: 'c.yaml',
    });
  });

  it('recognises -h', () => {
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it('rejects a missing destination', () => {
    expect(parseCliArgs(['in.txt'])).toEqual({
      kind: 'invalid',
      reason: 'Expected a source and a destination path',
    });
  });

  it('rejects extra arguments', () => {
    expect(parseCliArgs(['a', 'b', 'c'])).toEqual({ kind: 'invalid', reason: 'Unexpected argument: c' });
  });

  it('rejects unknown options', () => {
    expect(parseCliArgs(['--bogus', 'a', 'b']).kind).toBe('invalid');
  });
});

describe('main', () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pig-latin-cli-'));
    configPath = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(configPath, 'rules:\n  separator: "_"\n', 'utf-8');
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true });
  });

  it('converts a file using the configured rules', async () => {
    const source = path.join(tmpDir, 'in.txt');
    const destination = path.join(tmpDir, 'out.txt');
    await fs.writeFile(source, 'hello world\n', 'utf-8');
    expect(await main(['--config', configPath, source, destination])).toBe(EXIT_OK);
    expect(await fs.readFile(destination, 'utf-8')).toBe('ello_hay orld_way\n');
  });

  it('returns a failure code when the source is missing', async () => {
    const source = path.join(tmpDir, 'missing.txt');
    const destination = path.join(tmpDir, 'out.txt');
    expect(await main(['-c', configPath, source, destination])).toBe(EXIT_FAILURE);
    expect(process.stderr.write).toHaveBeenCalledWith(`pig-latin: Cannot open source: ${source}\n`);
  });

  it('returns a failure code for a missing config file', async () => {
    const missing = path.join(tmpDir, 'nope.yaml');
    expect(await main(['--config', missing, 'a', 'b'])).toBe(EXIT_FAILURE);
  });

  describe('log level from config', () => {
    const levelBefore = logger.level;
    const envBefore = process.env['LOG_LEVEL'];
    let source: string;
    let destination: string;

    beforeEach(async () => {
      source = path.join(tmpDir, 'in.txt');
      destination = path.join(tmpDir, 'out.txt');
      await fs.writeFile(source, 'apple\n', 'utf-8');
      await fs.writeFile(configPath, 'log_level: fatal\n', 'utf-8');
    });

    afterEach(() => {
      logger.level = levelBefore;
      if (envBefore === undefined) delete process.env['LOG_LEVEL'];
      else process.env['LOG_LEVEL'] = envBefore;
    });

    it('applies log_level when LOG_LEVEL is unset', async () => {
      delete process.env['LOG_LEVEL'];
      expect(await main(['--config', configPath, source, destination])).toBe(EXIT_OK);
      expect(logger.level).toBe('fatal');
    });

    it('leaves the level alone when LOG_LEVEL is set', async () => {
      process.env['LOG_LEVEL'] = 'error';
      expect(await main(['--config', configPath, source, destination])).toBe(EXIT_OK);
      expect(logger.level).toBe(levelBefore);
    });
  });

  it('returns the usage code for bad arguments', async () => {
    expect(await main(['only-one'])).toBe(EXIT_USAGE);
  });

  it('prints usage for --help', async () => {
    expect(await main(['--help'])).toBe(EXIT_OK);
    expect(process.stdout.write).toHaveBeenCalledWith(
      'Usage: pig-latin [--config <path>] <source> <destination>\n'
    );
  });
});
