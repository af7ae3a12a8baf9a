/**
 * Command Execution Wrapper
 *
 * Safe wrapper for executing external commands with:
 * - Optional timeout handling
 * - Bounded output capture
 */

import { spawn } from 'node:child_process';

// Per stream; ffmpeg writes its whole log to stderr
const MAX_OUTPUT_SIZE = 10 * 1024 * 1024;

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  timeout?: number; // milliseconds, 0 disables
}

/**
 * Execute an external command safely
 *
 * Resolves with the exit status whatever it is; rejects only when the
 * process could not be spawned at all.
 *
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const { timeout = 300000 } = options; // 5 minutes default

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    let timeoutId: NodeJS.Timeout | undefined;
    if (timeout > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        // Force kill after 10 seconds
        setTimeout(() => child.kill('SIGKILL'), 10000).unref();
      }, timeout);
    }

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < MAX_OUTPUT_SIZE) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < MAX_OUTPUT_SIZE) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, killSignal) => {
      clearTimeout(timeoutId);

      resolve({
        exitCode: code ?? (killSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      reject(error);
    });
  });
}

/**
 * Execute a command line through the platform shell
 *
 * The line is handed to the shell untouched, so quoting embedded in it
 * (e.g. a filter expression wrapped in double quotes) is honoured.
 */
export async function executeShellCommand(
  commandLine: string,
  options: CommandOptions = {}
): Promise<CommandResult> {
  const isWindows = process.platform === 'win32';
  const shell = isWindows ? 'cmd' : 'sh';
  const shellArg = isWindows ? '/c' : '-c';

  return executeCommand(shell, [shellArg, commandLine], options);
}
