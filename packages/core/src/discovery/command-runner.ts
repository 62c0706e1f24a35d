/**
 * ShellCommandRunner - Runs discovery commands through `sh -c`
 *
 * Discovery commands are authored by bundle creators, so they run with the
 * shell. The core adds no retry; a timeout is opt-in here at the process
 * boundary.
 */

import { spawn } from 'child_process';

/**
 * Command execution configuration
 */
export interface CommandConfig {
  /**
   * Maximum execution time in milliseconds
   * Default: none
   */
  timeout?: number;

  /**
   * Working directory for command execution
   * Default: process.cwd()
   */
  workingDirectory?: string;

  /**
   * Environment variables added to the inherited environment
   */
  env?: Record<string, string>;

  /**
   * Maximum stdout/stderr buffer size in bytes
   * Default: 10MB
   */
  maxBuffer?: number;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: string | null;
  command: string;
  duration: number;
  timedOut: boolean;
  error?: string;
}

/**
 * Anything that can run a shell command line
 */
export interface CommandRunner {
  run(command: string): Promise<CommandResult>;
}

const FORCE_KILL_DELAY = 5000;

export class ShellCommandRunner implements CommandRunner {
  private config: Required<Omit<CommandConfig, 'timeout'>> & { timeout?: number };

  constructor(config?: CommandConfig) {
    this.config = {
      timeout: config?.timeout,
      workingDirectory: config?.workingDirectory || process.cwd(),
      env: config?.env || {},
      maxBuffer: config?.maxBuffer || 10 * 1024 * 1024, // 10MB default
    };
  }

  async run(command: string): Promise<CommandResult> {
    const startTime = Date.now();
    const { timeout, workingDirectory, env, maxBuffer } = this.config;

    return new Promise((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let stdoutBytes = 0;
      let stderrBytes = 0;
      let timedOut = false;
      let overflowed = false;

      const childProcess = spawn('sh', ['-c', command], {
        cwd: workingDirectory,
        env: {
          ...process.env,
          ...env,
        },
      });

      const stop = () => {
        childProcess.kill('SIGTERM');

        // Force kill if still running
        setTimeout(() => {
          if (childProcess.exitCode === null) {
            childProcess.kill('SIGKILL');
          }
        }, FORCE_KILL_DELAY).unref();
      };

      let timeoutId: NodeJS.Timeout | undefined;
      if (timeout !== undefined && timeout > 0) {
        timeoutId = setTimeout(() => {
          timedOut = true;
          stop();
        }, timeout);
      }

      // Past the cap, stdout is discarded and the command fails
      const overflow = () => {
        if (!overflowed) {
          overflowed = true;
          stop();
        }
      };

      childProcess.stdout.on('data', (data: Buffer) => {
        if (overflowed) return;
        stdoutBytes += data.length;
        if (stdoutBytes > maxBuffer) {
          overflow();
        } else {
          stdout.push(data);
        }
      });

      childProcess.stderr.on('data', (data: Buffer) => {
        if (overflowed) return;
        stderrBytes += data.length;
        if (stderrBytes > maxBuffer) {
          overflow();
        } else {
          stderr.push(data);
        }
      });

      // Chunks are decoded together so multi-byte characters split across them survive
      const text = (chunks: Buffer[]) => Buffer.concat(chunks).toString('utf-8');

      childProcess.on('close', (exitCode, signal) => {
        clearTimeout(timeoutId);

        resolve({
          success: exitCode === 0 && !timedOut && !overflowed,
          stdout: overflowed ? '' : text(stdout),
          stderr: text(stderr).trim(),
          exitCode,
          signal,
          command,
          duration: Date.now() - startTime,
          timedOut,
          error: timedOut
            ? `command timed out after ${timeout}ms`
            : overflowed
              ? `command output exceeded ${maxBuffer} bytes`
              : exitCode !== 0
                ? `command exited with code ${exitCode}`
                : undefined,
        });
      });

      childProcess.on('error', (error) => {
        clearTimeout(timeoutId);

        resolve({
          success: false,
          stdout: text(stdout),
          stderr: text(stderr).trim(),
          exitCode: null,
          signal: null,
          command,
          duration: Date.now() - startTime,
          timedOut: false,
          error: error.message,
        });
      });
    });
  }
}
