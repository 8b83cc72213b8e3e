import spawn from 'cross-spawn';
import type { ChildProcess } from 'child_process';
import { formatCommand } from './errors';
import { Logger, consoleLogger } from './logger';

export interface CommandResult {
    success: boolean;
    exitCode: number;
    stdout: string;
    stderr: string;
}

export interface ExecuteOptions {
    cwd?: string;
    captureOutput?: boolean; // Defaults to true; false inherits the parent's stdio
    env?: Record<string, string>;
    signal?: AbortSignal; // Aborting kills the child process
}

export interface StreamingOptions {
    cwd?: string;
    env?: Record<string, string>;
    signal?: AbortSignal;
    prefix?: string; // Prepended to every echoed line
}

/**
 * Runs external toolchains. Both methods resolve, never reject: a program that cannot
 * be started yields success=false with exit code -1 and the reason in stderr.
 */
export interface CommandExecutor {
    execute(program: string, args: readonly string[], options?: ExecuteOptions): Promise<CommandResult>;
    executeStreaming(program: string, args: readonly string[], options?: StreamingOptions): Promise<CommandResult>;
}

type LineSink = (line: string) => void;

function createLineBuffer(sink: LineSink) {
    let pending = '';
    return {
        push(text: string) {
            pending += text;
            const lines = pending.split(/\r?\n/);
            pending = lines.pop() ?? '';
            for (const line of lines) sink(line);
        },
        flush() {
            if (pending) sink(pending);
            pending = '';
        }
    };
}

function failed(stdout: string, stderr: string, reason: string): CommandResult {
    return {
        success: false,
        exitCode: -1,
        stdout,
        stderr: stderr ? `${stderr}\n${reason}` : reason
    };
}

function runProcess(
    program: string,
    args: readonly string[],
    options: ExecuteOptions,
    onStdout?: LineSink,
    onStderr?: LineSink
): Promise<CommandResult> {
    const capture = options.captureOutput ?? true;

    return new Promise((resolve) => {
        let stdout = '';
        let stderr = '';
        let settled = false;
        const finish = (result: CommandResult) => {
            if (settled) return;
            settled = true;
            resolve(result);
        };

        if (options.signal?.aborted) {
            finish(failed('', '', 'Command was cancelled before it started'));
            return;
        }

        let child: ChildProcess;
        try {
            child = spawn(program, [...args], {
                cwd: options.cwd,
                env: { ...process.env, ...options.env },
                stdio: capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
                signal: options.signal
            });
        } catch (error) {
            finish(failed('', '', error instanceof Error ? error.message : String(error)));
            return;
        }

        const outLines = onStdout ? createLineBuffer(onStdout) : undefined;
        const errLines = onStderr ? createLineBuffer(onStderr) : undefined;

        child.stdout?.on('data', (chunk: Buffer) => {
            const text = chunk.toString();
            stdout += text;
            outLines?.push(text);
        });

        child.stderr?.on('data', (chunk: Buffer) => {
            const text = chunk.toString();
            stderr += text;
            errLines?.push(text);
        });

        child.on('error', (error: Error) => {
            const reason = error.name === 'AbortError' ? 'Command was cancelled' : error.message;
            finish(failed(stdout, stderr, reason));
        });

        child.on('close', (code: number | null) => {
            outLines?.flush();
            errLines?.flush();
            const exitCode = code ?? -1;
            finish({ success: exitCode === 0, exitCode, stdout, stderr });
        });
    });
}

export function createCommandExecutor(logger: Logger = consoleLogger): CommandExecutor {
    return {
        async execute(program, args, options = {}) {
            logger.debug(`Executing: ${formatCommand(program, args)}`);
            const result = await runProcess(program, args, options);
            if (!result.success) {
                logger.debug(`Command exited with code ${result.exitCode}: ${formatCommand(program, args)}`);
            }
            return result;
        },

        async executeStreaming(program, args, options = {}) {
            logger.debug(`Executing with streaming: ${formatCommand(program, args)}`);
            const prefix = options.prefix ?? '';
            return runProcess(
                program,
                args,
                { cwd: options.cwd, env: options.env, signal: options.signal, captureOutput: true },
                (line) => logger.info(`${prefix}${line}`),
                (line) => logger.warn(`${prefix}${line}`)
            );
        }
    };
}
