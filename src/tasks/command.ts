import { execa, ExecaError } from 'execa';
import type { CancellationToken } from '../core/cancellation.js';
import { ExecutionError, errorMessage } from '../core/errors.js';
import { fail, ok, type TaskContext, type TaskExecutor, type TaskOutcome } from '../core/executor.js';
import type { JsonObject } from '../core/types.js';

export const MAX_OUTPUT_CHARS = 4000;

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Runs a shell command until it exits or `signal` aborts. */
export type CommandRunner = (command: string, options: { signal: AbortSignal; cwd?: string }) => Promise<CommandResult>;

export function truncate(s: string, max = MAX_OUTPUT_CHARS): string {
  if (s.length <= max) return s;
  return s.slice(0, max) + `\n...[truncated ${s.length - max} chars]`;
}

export const execaRunner: CommandRunner = async (command, { signal, cwd }) => {
  try {
    const proc = await execa(command, { shell: true, cancelSignal: signal, cwd, windowsHide: true });
    return { exitCode: proc.exitCode ?? 0, stdout: proc.stdout, stderr: proc.stderr };
  } catch (err) {
    if (err instanceof ExecaError && !err.isCanceled && err.exitCode !== undefined) {
      return { exitCode: err.exitCode, stdout: String(err.stdout ?? ''), stderr: String(err.stderr ?? '') };
    }
    if (err instanceof ExecaError && err.isCanceled) throw err;
    throw new ExecutionError(`Command could not be started: ${errorMessage(err)}`, { cause: err });
  }
};

/**
 * `command` task: `{ command: string, cwd?: string }`. A non-zero exit code is
 * a failed attempt; cancellation and timeout kill the process.
 */
export class CommandTask implements TaskExecutor {
  constructor(private readonly run: CommandRunner = execaRunner) {}

  async execute(params: JsonObject, token: CancellationToken, context: TaskContext): Promise<TaskOutcome> {
    const { command, cwd } = params;
    if (typeof command !== 'string' || command.trim() === '') {
      return fail('params.command must be a non-empty string');
    }
    if (cwd !== undefined && typeof cwd !== 'string') return fail('params.cwd must be a string');

    context.log.info(`$ ${command}`);
    token.throwIfCancellationRequested();
    const res = await this.run(command, { signal: token.signal, cwd: cwd ?? context.outputDir ?? undefined });
    token.throwIfCancellationRequested();

    const stdout = truncate(res.stdout);
    const stderr = truncate(res.stderr);
    if (stdout.trim()) context.log.debug(`stdout:\n${stdout}`);
    if (res.exitCode !== 0) {
      return fail(`Command exited with code ${res.exitCode}${stderr.trim() ? `: ${stderr.trim()}` : ''}`);
    }
    return ok({ exit_code: res.exitCode, stdout, stderr });
  }
}
