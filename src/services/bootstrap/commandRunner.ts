import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { CommandTimeoutError } from './errors.js';
import type { CommandResult, CommandRunner, CommandSpec, OutputStream } from './types.js';

const KILL_GRACE_MS = 5000;

/**
 * Splits a chunked stream into whole lines, holding back a trailing partial
 * line until more data (or the end of the stream) arrives.
 */
export class LineBuffer {
  private pending = '';

  constructor(private onLine: (line: string) => void) {}

  push(chunk: string): void {
    const text = this.pending + chunk;
    const lines = text.split(/\r?\n/);
    this.pending = lines.pop() ?? '';
    for (const line of lines) {
      this.onLine(line);
    }
  }

  flush(): void {
    if (this.pending.length > 0) {
      this.onLine(this.pending);
      this.pending = '';
    }
  }
}

export function formatCommand(argv: string[]): string {
  return argv.map((arg) => (/[\s"'$]/.test(arg) ? JSON.stringify(arg) : arg)).join(' ');
}

/**
 * Signal the child's whole process group so installers it started go too.
 */
function killGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, signal);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ESRCH') return;
    child.kill(signal);
  }
}

export class SpawnCommandRunner implements CommandRunner {
  constructor(private defaultTimeoutMs?: number) {}

  run(
    spec: CommandSpec,
    onOutput?: (line: string, stream: OutputStream) => void
  ): Promise<CommandResult> {
    const [cmd, ...args] = spec.argv;
    if (!cmd) {
      return Promise.reject(new Error('Cannot run an empty command'));
    }

    const timeoutMs = spec.timeoutMs ?? this.defaultTimeoutMs;
    const startedAt = Date.now();

    return new Promise((resolve, reject) => {
      const child = spawn(cmd, args, {
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        // own process group, so a timeout can reach grandchildren
        detached: true,
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const stdoutLines = new LineBuffer((line) => onOutput?.(line, 'stdout'));
      const stderrLines = new LineBuffer((line) => onOutput?.(line, 'stderr'));

      child.stdout.on('data', (data: Buffer) => {
        const output = data.toString();
        stdout += output;
        stdoutLines.push(output);
      });

      child.stderr.on('data', (data: Buffer) => {
        const output = data.toString();
        stderr += output;
        stderrLines.push(output);
      });

      let timer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          if (settled) return;
          settled = true;
          killGroup(child, 'SIGTERM');
          killTimer = setTimeout(() => killGroup(child, 'SIGKILL'), KILL_GRACE_MS);
          killTimer.unref();
          reject(new CommandTimeoutError(formatCommand(spec.argv), timeoutMs));
        }, timeoutMs);
      }

      child.on('error', (error) => {
        if (timer) clearTimeout(timer);
        if (settled) return;
        settled = true;
        reject(error);
      });

      child.on('close', (code) => {
        if (timer) clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        stdoutLines.flush();
        stderrLines.flush();
        if (settled) return;
        settled = true;
        resolve({
          exitCode: code ?? 1,
          stdout,
          stderr,
          durationMs: Date.now() - startedAt,
        });
      });
    });
  }
}
