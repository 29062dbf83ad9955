import { spawn } from 'node:child_process';
import { createReadStream, createWriteStream } from 'node:fs';
import { finished } from 'node:stream/promises';

export type RunOptions = {
  /** File streamed to the command's stdin. */
  input?: string;
  /** File receiving the command's stdout. */
  output?: string;
  env?: NodeJS.ProcessEnv;
};

export type CommandRunner = {
  run(command: string, args: string[], options?: RunOptions): Promise<number>;
};

export const COMMAND_NOT_FOUND_EXIT = 127;
/** Reported when the input file cannot be read, whatever the command itself returned. */
export const INPUT_UNREADABLE_EXIT = 66;

export const spawnCommandRunner: CommandRunner = {
  async run(command, args, { input, output, env } = {}) {
    const child = spawn(command, args, {
      stdio: [input ? 'pipe' : 'inherit', output ? 'pipe' : 'inherit', 'inherit'],
      env: {
        ...process.env,
        ...env,
      },
    });

    const pending: Promise<unknown>[] = [];
    let inputFailed = false;
    if (input && child.stdin) {
      const source = createReadStream(input);
      source.on('error', (error) => {
        inputFailed = true;
        child.stdin?.destroy(error);
      });
      // the child may exit before reading everything; that surfaces through its exit code
      child.stdin.on('error', () => undefined);
      source.pipe(child.stdin);
    }
    if (output && child.stdout) {
      const sink = createWriteStream(output);
      child.stdout.pipe(sink);
      pending.push(finished(sink));
    }

    const exitCode = await new Promise<number>((resolve) => {
      child.on('error', () => resolve(COMMAND_NOT_FOUND_EXIT));
      child.on('close', (code) => resolve(code ?? 1));
    });

    await Promise.all(pending);
    return inputFailed ? INPUT_UNREADABLE_EXIT : exitCode;
  },
};
