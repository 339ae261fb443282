import process from 'node:process';

import { afterEach, describe, expect, it } from 'vitest';

import { createMemoryCliIo } from '../testing/memory-cli-io.js';
import { DuplicateCommandModuleError, createCliKernel, resolveExitCode } from './cli-kernel.js';
import type { CliCommandModule, CliGlobalOptions } from './types.js';

const kernelOptions = {
  programName: 'rigbuild',
  version: '0.0.0-test',
} as const;

const failingModule = (error: unknown): CliCommandModule => ({
  id: 'test.fail',
  register(program) {
    program.command('fail').action(() => {
      throw error;
    });
  },
});

describe('createCliKernel', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it('prints the version and exits cleanly', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...kernelOptions, io });

    const exitCode = await kernel.run(['node', 'rigbuild', '--version']);

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe('0.0.0-test\n');
  });

  it('returns commander exit codes for unknown commands', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...kernelOptions, io });
    kernel.register(failingModule(new Error('boom')));

    const exitCode = await kernel.run(['node', 'rigbuild', 'explode']);

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toContain("error: unknown command 'explode'");
  });

  it('reports thrown errors by name and message', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...kernelOptions, io });
    kernel.register(failingModule(new TypeError('boom')));

    const exitCode = await kernel.run(['node', 'rigbuild', 'fail']);

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toBe('TypeError: boom\n');
  });

  it('prints stack traces with --verbose', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...kernelOptions, io });
    const error = new Error('boom');
    kernel.register(failingModule(error));

    const exitCode = await kernel.run(['node', 'rigbuild', '--verbose', 'fail']);

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toBe(`${error.stack ?? ''}\n`);
  });

  it('returns and restores exit codes recorded by commands', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...kernelOptions, io });
    kernel.register({
      id: 'test.exit-code',
      register(program) {
        program.command('soft-fail').action(() => {
          process.exitCode = 3;
        });
      },
    });

    const exitCode = await kernel.run(['node', 'rigbuild', 'soft-fail']);

    expect(exitCode).toBe(3);
    expect(process.exitCode).toBeUndefined();
  });

  it('exposes global options to command modules', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...kernelOptions, io });
    const seen: CliGlobalOptions[] = [];
    kernel.register({
      id: 'test.globals',
      register(program, context) {
        program.command('inspect').action(() => {
          seen.push(context.getGlobalOptions());
        });
      },
    });

    await kernel.run(['node', 'rigbuild', '--json-logs', '--log-level', 'WARN', 'inspect']);

    expect(seen).toEqual([{ logFormat: 'json', logLevel: 'warn', verbose: false }]);
  });

  it('rejects unknown log levels', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...kernelOptions, io });

    const exitCode = await kernel.run(['node', 'rigbuild', '--log-level', 'loud']);

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toContain(
      'Invalid log level "loud". Expected one of: debug, info, warn, error.',
    );
  });
});

describe('createCliKernel module registration', () => {
  it('rejects two modules with the same id', () => {
    const kernel = createCliKernel({ ...kernelOptions, io: createMemoryCliIo() });
    kernel.register(failingModule(new Error('first')));

    expect(() => kernel.register(failingModule(new Error('second')))).toThrow(
      DuplicateCommandModuleError,
    );
  });
});

describe('resolveExitCode', () => {
  it('prefers a non-zero code recorded by a command', () => {
    expect(resolveExitCode({ kind: 'completed' }, 4)).toBe(4);
    expect(resolveExitCode({ kind: 'commander', exitCode: 1 }, 2)).toBe(2);
  });

  it('falls back to the outcome when nothing was recorded', () => {
    expect(resolveExitCode({ kind: 'completed' }, undefined)).toBe(0);
    expect(resolveExitCode({ kind: 'completed' }, 0)).toBe(0);
    expect(resolveExitCode({ kind: 'commander', exitCode: 0 }, undefined)).toBe(0);
    expect(resolveExitCode({ kind: 'failed' }, '1')).toBe(1);
  });
});
