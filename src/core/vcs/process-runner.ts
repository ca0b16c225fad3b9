import { spawn } from 'child_process';
import { ExternalToolException } from '@/core/exceptions';
import { logger } from '@/utils/cli/logger';
import { ProcessOptions, ProcessResult } from './types';

/**
 * Runs a command without a shell and collects its output.
 *
 * Resolves with the exit code whatever it is; rejects only when the process
 * cannot be started.
 */
export const runProcess = (
  command: string,
  args: readonly string[],
  options: ProcessOptions
): Promise<ProcessResult> => {
  logger.debug(`exec: ${command} ${args.join(' ')}`);

  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => {
      stdout.push(chunk);
      if (options.echo) process.stdout.write(chunk);
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr.push(chunk);
      if (options.echo) process.stderr.write(chunk);
    });

    child.on('error', (error) => {
      reject(
        new ExternalToolException(command, `Unable to run '${command}': ${error.message}`, null, '', error)
      );
    });

    child.on('close', (code, signal) => {
      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
      });
    });
  });
};
