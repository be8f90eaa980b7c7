/**
 * Command Execution Wrapper
 *
 * Runs external collaborators (pack updaters, uploader scripts, git) with:
 * - Timeout handling
 * - Output capture
 * - Abort signal forwarding
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

/**
 * Execute an external command and capture its output.
 * Resolves with the exit code; only spawn failures reject.
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 600000, // 10 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | undefined;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
    }, timeout);

    const onAbort = () => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    const cleanup = () => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    child.on('close', (code, exitSignal) => {
      cleanup();
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}

/**
 * Execute a shell command line, passing `args` as positional parameters.
 *
 * On POSIX the arguments reach the command through "$@", so they are never
 * re-parsed by the shell.
 */
export async function executeShell(
  commandLine: string,
  args: string[] = [],
  options: CommandOptions = {}
): Promise<CommandResult> {
  if (process.platform === 'win32') {
    const quoted = args.map((arg) => `"${arg.replace(/"/g, '""')}"`);
    return executeCommand('cmd', ['/c', [commandLine, ...quoted].join(' ')], options);
  }
  const script = args.length > 0 ? `${commandLine} "$@"` : commandLine;
  return executeCommand('sh', ['-c', script, 'packpub', ...args], options);
}

/**
 * Combined, trimmed output of a finished command (stderr first when present)
 */
export function commandOutput(result: CommandResult): string {
  return [result.stderr.trim(), result.stdout.trim()].filter(Boolean).join('\n');
}
