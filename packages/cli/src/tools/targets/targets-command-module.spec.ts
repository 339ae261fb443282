import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import process from 'node:process';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createCliKernel } from '../../kernel/cli-kernel.js';
import { createMemoryCliIo, type MemoryCliIo } from '../../testing/memory-cli-io.js';
import { createTargetsCommandModule } from './targets-command-module.js';

const LINUX_PLAN = [
  'Target dlib (platform: linux, openblas: off)',
  'Dependencies: none',
  'CMake arguments:',
  '  -DDLIB_NO_GUI_SUPPORT=TRUE',
  '  -DDLIB_ENABLE_ASSERTS=OFF',
  '  -DDLIB_PNG_SUPPORT=OFF',
  '  -DDLIB_JPEG_SUPPORT=OFF',
  '  -DDLIB_GIF_SUPPORT=OFF',
  '  -DDLIB_LINK_WITH_SQLITE3=OFF',
  '  -DDLIB_USE_CUDA=OFF',
  '  -DDLIB_USE_LAPACK=OFF',
  '  -DDLIB_USE_BLAS=OFF',
  'Compiler flags:',
  '  -Wno-tautological-constant-compare',
  'Product injections: none',
  'System libraries: none',
  '',
].join('\n');

describe('targetsCommandModule', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), 'rigbuild-cli-'));
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await rm(workspace, { recursive: true, force: true });
  });

  const run = async (
    args: readonly string[],
    hostPlatform: NodeJS.Platform = 'linux',
  ): Promise<{ exitCode: number; io: MemoryCliIo }> => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ programName: 'rigbuild', version: '0.0.0-test', io });
    kernel.register(createTargetsCommandModule({ cwd: workspace, hostPlatform }));
    const exitCode = await kernel.run(['node', 'rigbuild', ...args]);
    return { exitCode, io };
  };

  it('prints help when targets is invoked without a subcommand', async () => {
    const { exitCode, io } = await run(['targets']);

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toContain('Usage: rigbuild targets');
  });

  it('lists registered targets', async () => {
    const { exitCode, io } = await run(['targets', 'list']);

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe('dlib\n');
  });

  it('plans dlib for linux in human-readable form', async () => {
    const { exitCode, io } = await run(['targets', 'plan', 'dlib', '--platform', 'linux']);

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe(LINUX_PLAN);
    expect(io.stderrBuffer).toBe('');
  });

  it('plans for the host platform when none is given', async () => {
    const { io } = await run(['targets', 'plan', 'dlib'], 'linux');

    expect(io.stdoutBuffer).toBe(LINUX_PLAN);
  });

  it('plans dlib for macOS as JSON', async () => {
    const { exitCode, io } = await run([
      'targets',
      'plan',
      'dlib',
      '--platform',
      'macos',
      '--format',
      'json',
    ]);

    expect(exitCode).toBe(0);
    const plan: unknown = JSON.parse(io.stdoutBuffer);
    expect(plan).toMatchObject({
      target: 'dlib',
      platform: 'macos',
      openblas: false,
      dependencies: [],
      compilerFlags: [],
      productInjections: [],
      systemLibraries: ['-framework Accelerate'],
    });
    expect(plan).toHaveProperty('options.8', 'DLIB_USE_BLAS=ON');
  });

  it('reads platform and openblas from the configuration file', async () => {
    await writeFile(
      path.join(workspace, 'rigbuild.config.json'),
      JSON.stringify({ platform: 'linux', openblas: true }),
      'utf8',
    );

    const { exitCode, io } = await run(['targets', 'plan', 'dlib'], 'darwin');

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toContain('Target dlib (platform: linux, openblas: on)');
    expect(io.stdoutBuffer).toContain(
      'Product injections:\n  OpenBLAS -> dlib (OPENBLAS_INCLUDE, OPENBLAS_LIBS)\n',
    );
    expect(io.stdoutBuffer).toContain('  -DDLIB_USE_BLAS=ON\n');
  });

  it('lets --no-openblas override the configuration file', async () => {
    await writeFile(
      path.join(workspace, 'rigbuild.config.json'),
      JSON.stringify({ platform: 'linux', openblas: true }),
      'utf8',
    );

    const { io } = await run(['targets', 'plan', 'dlib', '--no-openblas']);

    expect(io.stdoutBuffer).toBe(LINUX_PLAN);
  });

  it('loads an explicit configuration path', async () => {
    await writeFile(
      path.join(workspace, 'ios.json'),
      JSON.stringify({ platform: 'ios' }),
      'utf8',
    );

    const { io } = await run(['targets', 'plan', 'dlib', '--config', 'ios.json']);

    expect(io.stdoutBuffer).toContain('Target dlib (platform: ios, openblas: off)');
    expect(io.stdoutBuffer).toContain('System libraries:\n  -framework Accelerate\n');
  });

  it('reports a missing configuration file', async () => {
    const { exitCode, io } = await run(['targets', 'plan', 'dlib', '-c', 'absent.json']);

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toBe(
      `Configuration file not found at ${path.join(workspace, 'absent.json')}\n`,
    );
  });

  it('fails on configuration files with unknown fields', async () => {
    await writeFile(
      path.join(workspace, 'rigbuild.config.json'),
      JSON.stringify({ platform: 'linux', targets: ['dlib'] }),
      'utf8',
    );

    const { exitCode, io } = await run(['targets', 'plan', 'dlib']);

    expect(exitCode).toBe(1);
    expect(io.stdoutBuffer).toBe('');
    expect(io.stderrBuffer).toMatch(/^ZodError: /);
  });

  it('reports unknown targets with exit code 1', async () => {
    const { exitCode, io } = await run(['targets', 'plan', 'opencv', '--platform', 'linux']);

    expect(exitCode).toBe(1);
    expect(io.stdoutBuffer).toBe('');
    expect(io.stderrBuffer).toBe('Unknown target "opencv". Available targets: dlib.\n');
  });

  it('rejects unknown platforms', async () => {
    const { exitCode, io } = await run(['targets', 'plan', 'dlib', '--platform', 'solaris']);

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toContain('Unsupported platform "solaris"');
  });

  it('reports hosts without a matching platform', async () => {
    const { exitCode, io } = await run(['targets', 'plan', 'dlib'], 'aix');

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toBe(
      'Unsupported platform "aix". Expected one of: linux, macos, ios, windows, android.\n',
    );
  });

  it('emits stage events as JSON lines with --json-logs', async () => {
    const { exitCode, io } = await run([
      '--json-logs',
      'targets',
      'plan',
      'dlib',
      '--platform',
      'windows',
    ]);

    expect(exitCode).toBe(0);
    const entries = io.stderrBuffer
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line) as { event: string; data: { stage: string } });
    expect(entries.map((entry) => `${entry.event}:${entry.data.stage}`)).toEqual([
      'target.stage.start:dependencies',
      'target.stage.complete:dependencies',
      'target.stage.start:configure',
      'target.stage.complete:configure',
      'target.stage.start:package',
      'target.stage.complete:package',
    ]);
  });
});
