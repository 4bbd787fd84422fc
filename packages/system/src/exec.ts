import { execFile } from 'child_process';
import { readFile } from 'fs/promises';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs a binary without a shell. Rejects on a non-zero exit status.
 */
export type CommandRunner = (binary: string, args: readonly string[]) => Promise<CommandOutput>;

/** Reads a file as trimmed text, or undefined when it does not exist */
export type SysfsReader = (path: string) => Promise<string | undefined>;

export const runCommand: CommandRunner = async (binary, args) => {
  const { stdout, stderr } = await execFileAsync(binary, [...args], { encoding: 'utf8' });
  return { stdout, stderr };
};

export const readSysfs: SysfsReader = async path => {
  try {
    return (await readFile(path, 'utf8')).trim();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
};

/**
 * Exit status of a failed command, when the failure came from the process itself
 */
export function exitCodeOf(error: unknown): number | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}
