import { spawn } from 'child_process';
import type { ExecCommand, ExecOptions, ExecResult } from '../types';

/** Exit code reported when a command is killed for exceeding its timeout */
export const TIMEOUT_EXIT_CODE = 124;

/**
 * Creates the spawn-based execCommand injected into LocalGitObjectStore.
 *
 * Never rejects: spawn failures and timeouts resolve with a non-zero exit
 * code and a message on stderr so callers handle every failure the same way.
 */
export function createExecCommand(defaultCwd: string): ExecCommand {
  return (command: string, args: string[], options?: ExecOptions): Promise<ExecResult> => {
    return new Promise<ExecResult>((resolve) => {
      const proc = spawn(command, args, {
        cwd: options?.cwd || defaultCwd,
        env: { ...process.env, ...options?.env },
      });

      // chunks are decoded once at the end so multi-byte characters split across reads survive
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      const stdout = () => Buffer.concat(stdoutChunks).toString('utf8');
      const stderr = () => Buffer.concat(stderrChunks).toString('utf8');
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (result: ExecResult) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(result);
      };

      if (options?.timeout && options.timeout > 0) {
        const timeoutMs = options.timeout;
        timer = setTimeout(() => {
          proc.kill('SIGKILL');
          finish({
            exitCode: TIMEOUT_EXIT_CODE,
            stdout: stdout(),
            stderr: `${stderr()}${command} ${args[0] ?? ''} timed out after ${timeoutMs}ms`,
          });
        }, timeoutMs);
      }

      proc.stdout?.on('data', (data: Buffer) => { stdoutChunks.push(data); });
      proc.stderr?.on('data', (data: Buffer) => { stderrChunks.push(data); });

      proc.on('close', (code) => {
        finish({ stdout: stdout(), stderr: stderr(), exitCode: code ?? 1 });
      });

      proc.on('error', (error) => {
        finish({ stdout: stdout(), stderr: error.message, exitCode: 1 });
      });

      // EPIPE when git exits before reading stdin surfaces through 'close'
      proc.stdin?.on('error', () => undefined);
      if (options?.input !== undefined) {
        proc.stdin?.end(options.input);
      } else {
        proc.stdin?.end();
      }
    });
  };
}
