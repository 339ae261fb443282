import process from 'node:process';

import type { CliIo } from './cli-io.js';

export interface ProcessCliIoOptions {
  readonly process?: NodeJS.Process;
}

export const createProcessCliIo = (options: ProcessCliIoOptions = {}): CliIo => {
  const target = options.process ?? process;

  return {
    writeOut: (chunk: string) => {
      target.stdout.write(chunk);
    },
    writeErr: (chunk: string) => {
      target.stderr.write(chunk);
    },
    exit: (code: number): never => {
      // A failure recorded on the process wins over a clean kernel exit.
      const recorded = typeof target.exitCode === 'number' ? target.exitCode : 0;
      return target.exit(code === 0 && recorded !== 0 ? recorded : code);
    },
  };
};
