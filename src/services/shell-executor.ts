import { exec as cpExec } from 'node:child_process';
import type { IShellExecutor, ExecResult, ExecOptions } from '../types.js';

export class ShellExecutor implements IShellExecutor {
  async exec(command: string, options?: ExecOptions): Promise<ExecResult> {
    return new Promise((resolve) => {
      const cp = cpExec(
        command,
        {
          cwd: options?.cwd,
          timeout: options?.timeout,
          // the deadline must hold even if the child traps SIGTERM
          killSignal: 'SIGKILL',
          maxBuffer: 10 * 1024 * 1024,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ stdout: stdout ?? '', stderr: stderr ?? '', exitCode: 0 });
            return;
          }
          const timedOut = Boolean(options?.timeout) && error.killed === true && error.signal === 'SIGKILL';
          let exitCode = typeof error.code === 'number' ? error.code : 1;
          if (!timedOut && error.signal === 'SIGKILL') {
            // killed from outside, usually the OOM killer: report it the way a shell would
            exitCode = 137;
          }
          resolve({
            stdout: stdout ?? '',
            stderr: stderr ?? '',
            exitCode,
            ...(timedOut ? { timedOut } : {}),
          });
        },
      );

      cp.on('error', (err) => {
        resolve({ stdout: '', stderr: `Process error: ${err.message}`, exitCode: 1 });
      });
    });
  }
}

type PatternHandler = (match: RegExpMatchArray) => ExecResult | Promise<ExecResult>;

export class MockShellExecutor implements IShellExecutor {
  readonly commands: string[] = [];
  readonly calls: Array<{ command: string; options?: ExecOptions }> = [];
  private responses = new Map<string, ExecResult>();
  private patterns: Array<{ regex: RegExp; handler: PatternHandler }> = [];

  addResponse(command: string, result: ExecResult): void {
    this.responses.set(command, result);
  }

  addResponsePattern(regex: RegExp, handler: PatternHandler): void {
    this.patterns.push({ regex, handler });
  }

  async exec(command: string, options?: ExecOptions): Promise<ExecResult> {
    this.commands.push(command);
    this.calls.push({ command, options });

    const exact = this.responses.get(command);
    if (exact) return exact;

    for (const { regex, handler } of this.patterns) {
      const match = command.match(regex);
      if (match) return handler(match);
    }

    return {
      stdout: '',
      stderr: `Command not mocked: ${command}`,
      exitCode: 1,
    };
  }
}
