/**
 * Output surface the CLI writes through, so commands never touch `process` directly.
 */
export interface CliIo {
  writeOut(chunk: string): void;
  writeErr(chunk: string): void;
  exit(code: number): never;
}
