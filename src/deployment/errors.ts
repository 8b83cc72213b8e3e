import type { CommandResult } from './executor';

export enum BuildErrorKind {
    ENVIRONMENT_MISSING = 'ENVIRONMENT_MISSING',
    PROJECT_NOT_FOUND = 'PROJECT_NOT_FOUND',
    TOOL_INVOCATION_FAILED = 'TOOL_INVOCATION_FAILED',
    ARTIFACT_MISSING = 'ARTIFACT_MISSING',
    MANIFEST_DETECTION_FAILED = 'MANIFEST_DETECTION_FAILED',
    PLATFORM_UNDETECTED = 'PLATFORM_UNDETECTED',
    UNSUPPORTED_PLATFORM = 'UNSUPPORTED_PLATFORM',
    FILE_OPERATION_FAILED = 'FILE_OPERATION_FAILED',
    CANCELLED = 'CANCELLED'
}

export type BuildStep =
    | 'detect'
    | 'validate'
    | 'clean'
    | 'resolve'
    | 'restore'
    | 'compile'
    | 'publish'
    | 'verify'
    | 'manifest'
    | 'settings'
    | 'package';

export interface BuildFailure {
    readonly kind: BuildErrorKind;
    readonly step: BuildStep;
    readonly message: string;
    /** Command line that failed, for tool invocation failures */
    readonly command?: string;
    /** Captured diagnostic output, verbatim */
    readonly output?: string;
    readonly mitigation: readonly string[];
}

export interface StepSuccess<T> {
    success: true;
    value: T;
}

export interface StepError {
    success: false;
    error: BuildFailure;
}

export type StepResult<T> = StepSuccess<T> | StepError;

export function ok<T>(value: T): StepSuccess<T> {
    return { success: true, value };
}

export function fail(
    kind: BuildErrorKind,
    step: BuildStep,
    message: string,
    extra: { command?: string; output?: string; mitigation?: readonly string[] } = {}
): StepError {
    return {
        success: false,
        error: {
            kind,
            step,
            message,
            command: extra.command,
            output: extra.output,
            mitigation: extra.mitigation ?? []
        }
    };
}

export function formatCommand(program: string, args: readonly string[]): string {
    return [program, ...args].map((part) => (/\s/.test(part) ? `"${part}"` : part)).join(' ');
}

/**
 * Failure for a command that exited non-zero. stderr is kept as-is; stdout stands in
 * when the tool reported nothing on stderr.
 */
export function toolFailure(
    step: BuildStep,
    program: string,
    args: readonly string[],
    result: CommandResult,
    mitigation: readonly string[] = []
): StepError {
    const command = formatCommand(program, args);
    const output = result.stderr.trim() ? result.stderr : result.stdout;
    return fail(
        BuildErrorKind.TOOL_INVOCATION_FAILED,
        step,
        `'${command}' failed with exit code ${result.exitCode}`,
        { command, output, mitigation }
    );
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Failure for a filesystem operation that threw (ENOENT, EACCES, ...) while a step ran.
 */
export function fileFailure(step: BuildStep, error: unknown): StepError {
    return fail(BuildErrorKind.FILE_OPERATION_FAILED, step, `File operation failed during ${step}: ${errorMessage(error)}`, {
        mitigation: ['Check that the project and output directories exist and are writable, then re-run the build.']
    });
}

/**
 * Renders a failure for terminal output.
 */
export function formatFailure(failure: BuildFailure): string {
    const lines: string[] = [`ERROR: ${failure.message}`, '', `  Step: ${failure.step}`];

    if (failure.command) {
        lines.push(`  Command: ${failure.command}`);
    }
    if (failure.output && failure.output.trim()) {
        lines.push('  Output:');
        for (const line of failure.output.trimEnd().split(/\r?\n/)) {
            lines.push(`    ${line}`);
        }
    }

    if (failure.mitigation.length > 0) {
        lines.push('', 'To resolve this issue:');
        failure.mitigation.forEach((step, index) => lines.push(`  ${index + 1}. ${step}`));
    }

    lines.push('', `Error code: ${failure.kind}`);
    return lines.join('\n');
}
