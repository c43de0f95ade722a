import { spawn } from 'child_process';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  allowNonZeroExit?: boolean;
  /** Kill the child and reject once this many milliseconds have passed */
  timeoutMs?: number;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandRunner {
  run(command: string, args?: string[], options?: RunOptions): Promise<RunResult>;
}

export class CommandTimeoutError extends Error {
  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = 'CommandTimeoutError';
  }
}

export class ChildProcessRunner implements CommandRunner {
  async run(command: string, args: string[] = [], options: RunOptions = {}): Promise<RunResult> {
    const { cwd, env, allowNonZeroExit = false, timeoutMs } = options;
    return new Promise<RunResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd,
        env,
        shell: false,
        windowsHide: true,
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const timer =
        timeoutMs !== undefined
          ? setTimeout(() => {
              settled = true;
              child.kill();
              reject(new CommandTimeoutError(command, timeoutMs));
            }, timeoutMs)
          : undefined;

      child.stdout?.on('data', (data) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        const exitCode = code ?? 0;
        if (exitCode !== 0 && !allowNonZeroExit) {
          reject(new Error(`Command failed: ${command} ${args.join(' ')}\n${stderr.trim()}`));
          return;
        }
        resolve({ stdout, stderr, exitCode });
      });

      child.on('error', (error) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        reject(error);
      });
    });
  }
}
