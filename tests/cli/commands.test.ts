import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { Command } from 'commander';
import { registerMainCommand } from '../../src/cli/commands';
import { setSilentMode, setVerboseMode, isSilentMode } from '../../src/output/logger';
import { Sender } from '../../src/message/sender';
import { SerializationError } from '../../src/errors/index';

const SANTA_TEXT =
  'I have tried to be good all year and hope that you and your reindeers will be able to deliver me a nice present.';

class ExitCalled extends Error {
  constructor(public readonly exitCode: string | number | null | undefined) {
    super(`process.exit(${String(exitCode)})`);
  }
}

function createProgram(): Command {
  const program = new Command();
  program.name('message-director').exitOverride();
  registerMainCommand(program);
  return program;
}

const ENV_KEYS = ['MESSAGE_DIRECTOR_FORMAT', 'MESSAGE_DIRECTOR_COLOR'] as const;

describe('main command', () => {
  const originalLevel = chalk.level;
  const savedEnv = new Map<string, string | undefined>();

  beforeEach(() => {
    chalk.level = 0;
    for (const key of ENV_KEYS) {
      savedEnv.set(key, process.env[key]);
      delete process.env[key];
    }
    vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new ExitCalled(code);
    });
  });

  afterEach(() => {
    chalk.level = originalLevel;
    setSilentMode(false);
    setVerboseMode(false);
    for (const key of ENV_KEYS) {
      const value = savedEnv.get(key);
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    vi.restoreAllMocks();
  });

  it('prints both formats as raw bodies', () => {
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    createProgram().parse(['node', 'message-director', '--output', 'raw']);

    expect(isSilentMode()).toBe(true);
    expect(writeSpy.mock.calls).toEqual([
      [`{"recipient":"Santa Claus","message":"${SANTA_TEXT}"}\n`],
      [`<XMLMessage><recipient>Santa Claus</recipient><body>${SANTA_TEXT}</body></XMLMessage>\n`],
    ]);
  });

  it('builds only the requested format', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    createProgram().parse(['node', 'message-director', '--format', 'XML']);

    expect(logSpy).toHaveBeenCalledWith('XML (184 bytes)');
    expect(logSpy).not.toHaveBeenCalledWith('JSON (152 bytes)');
    expect(logSpy).toHaveBeenLastCalledWith('✓ Built 1 message.');
  });

  it('takes the format from the environment when no flag is given', () => {
    process.env.MESSAGE_DIRECTOR_FORMAT = 'json';
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    createProgram().parse(['node', 'message-director', '--output', 'raw']);

    expect(writeSpy).toHaveBeenCalledTimes(1);
    expect(writeSpy).toHaveBeenCalledWith(`{"recipient":"Santa Claus","message":"${SANTA_TEXT}"}\n`);
  });

  it('lets the flag override the environment', () => {
    process.env.MESSAGE_DIRECTOR_FORMAT = 'json';
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    createProgram().parse(['node', 'message-director', '-f', 'xml', '--output', 'raw']);

    expect(writeSpy).toHaveBeenCalledTimes(1);
    expect(writeSpy).toHaveBeenCalledWith(
      `<XMLMessage><recipient>Santa Claus</recipient><body>${SANTA_TEXT}</body></XMLMessage>\n`
    );
  });

  it('exits with 1 on an invalid format flag', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => createProgram().parse(['node', 'message-director', '--format', 'yaml'])).toThrow('process.exit(1)');
    expect(errorSpy).toHaveBeenCalledWith("Error: Invalid CLI options: --format must be one of 'json', 'xml' or 'all'");
  });

  it('exits with 1 on an invalid environment', () => {
    process.env.MESSAGE_DIRECTOR_FORMAT = 'yaml';
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => createProgram().parse(['node', 'message-director'])).toThrow('process.exit(1)');
    expect(errorSpy).toHaveBeenCalledWith(
      "Error: Invalid environment variables: MESSAGE_DIRECTOR_FORMAT must be one of 'json', 'xml' or 'all'"
    );
  });

  it('exits with 1 when a message cannot be serialized', () => {
    vi.spyOn(Sender.prototype, 'buildMessage').mockImplementation(() => {
      throw new SerializationError('codec refused', 'XML');
    });
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => createProgram().parse(['node', 'message-director', '--format', 'xml'])).toThrow('process.exit(1)');
    expect(process.exit).toHaveBeenCalledWith(1);
    expect(errorSpy).toHaveBeenCalledWith('Error: XML serialization failed: codec refused');
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('turns colour off when the environment asks for it', () => {
    chalk.level = 1;
    process.env.MESSAGE_DIRECTOR_COLOR = 'false';
    vi.spyOn(console, 'log').mockImplementation(() => {});

    createProgram().parse(['node', 'message-director', '--format', 'json']);

    expect(chalk.level).toBe(0);
  });
});
