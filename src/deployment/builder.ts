import fs from 'fs-extra';
import path from 'path';
import { DeploymentTarget, DEPLOYMENT_FILE_CONTENT, ProjectPlatform } from './config';
import { BuildErrorKind, BuildStep, fail, formatCommand, ok, StepError, StepResult, toolFailure } from './errors';
import { CommandExecutor, CommandResult } from './executor';
import { Logger } from './logger';
import { Manifest } from './manifest';

/**
 * Everything a lifecycle step may touch besides the filesystem. Builders hold no
 * state of their own, so one builder serves any number of projects, even concurrently.
 */
export interface BuildContext {
    readonly executor: CommandExecutor;
    readonly logger: Logger;
    readonly signal?: AbortSignal;
}

/**
 * One platform's build lifecycle. The orchestrator calls the steps strictly in order
 * (validateEnvironment, clean, build, createManifest) and stops at the first failure.
 *
 * Building the same project into the same output path from two callers at once is
 * unsupported: the artifact directory belongs to the single build in flight.
 */
export interface PlatformBuilder {
    readonly platform: ProjectPlatform;

    /** Probes the toolchain. Logs remediation and returns false when it is missing. */
    validateEnvironment(ctx: BuildContext): Promise<boolean>;

    /** Removes prior build state from the project directory. */
    clean(projectDir: string, ctx: BuildContext): Promise<StepResult<void>>;

    /**
     * Restores dependencies and produces the artifact directory, replacing any previous
     * one. Resolves to the absolute artifact path.
     */
    build(projectDir: string, outputPath: string, verbose: boolean, ctx: BuildContext): Promise<StepResult<string>>;

    /** Derives the manifest from the artifact and project metadata without rebuilding. */
    createManifest(projectDir: string, artifactPath: string, ctx: BuildContext): Promise<StepResult<Manifest>>;

    /** Publishes environment variables to the deployment target; true when nothing needs doing. */
    convertEnvironmentToDeploymentSettings(
        projectDir: string,
        target: DeploymentTarget,
        verbose: boolean,
        ctx: BuildContext
    ): Promise<boolean>;
}

export function resolveArtifactPath(projectDir: string, outputPath: string): string {
    return path.resolve(projectDir, outputPath);
}

/**
 * Runs a toolchain command. Verbose runs stream output live; quiet runs capture it
 * and only echo it when the command fails.
 */
export async function executeWithOutput(
    ctx: BuildContext,
    program: string,
    args: readonly string[],
    cwd: string,
    verbose: boolean
): Promise<CommandResult> {
    if (verbose) {
        return ctx.executor.executeStreaming(program, args, { cwd, signal: ctx.signal });
    }

    const result = await ctx.executor.execute(program, args, { cwd, signal: ctx.signal });
    if (!result.success) {
        if (result.stdout.trim()) ctx.logger.info(`Output:\n${result.stdout.trimEnd()}`);
        if (result.stderr.trim()) ctx.logger.warn(`Warnings/Errors:\n${result.stderr.trimEnd()}`);
    }
    return result;
}

/**
 * Failure for a command that did not succeed. A command killed because the build was
 * aborted reports CANCELLED rather than a tool failure.
 */
export function commandFailure(
    ctx: BuildContext,
    step: BuildStep,
    program: string,
    args: readonly string[],
    result: CommandResult,
    mitigation: readonly string[] = []
): StepError {
    if (ctx.signal?.aborted) {
        const command = formatCommand(program, args);
        return fail(BuildErrorKind.CANCELLED, step, `'${command}' was cancelled`, { command });
    }
    return toolFailure(step, program, args, result, mitigation);
}

/**
 * Deletes a previous artifact directory so the new build replaces it rather than
 * merging into it.
 */
export async function removeArtifact(artifactPath: string, logger: Logger): Promise<void> {
    if (await fs.pathExists(artifactPath)) {
        logger.info('Removing old publish directory...');
        await fs.remove(artifactPath);
    }
}

export async function verifyArtifact(artifactPath: string): Promise<StepResult<string>> {
    if (await fs.pathExists(artifactPath)) {
        return ok(artifactPath);
    }
    return fail(
        BuildErrorKind.ARTIFACT_MISSING,
        'verify',
        `Expected publish output path not found: ${artifactPath}`,
        { mitigation: ['Re-run the build with verbose output and check where the toolchain wrote its output.'] }
    );
}

/** Asks the deployment host to run its own build of the uploaded package. */
export async function writeDeploymentFile(artifactPath: string, logger: Logger): Promise<void> {
    await fs.writeFile(path.join(artifactPath, '.deployment'), DEPLOYMENT_FILE_CONTENT);
    logger.info('Created .deployment file to force a server-side build');
}

/**
 * Matches a file or directory name against exclusion patterns:
 * exact names, `*.ext` suffixes and `prefix*` prefixes, case-insensitively.
 */
export function matchesPattern(name: string, pattern: string): boolean {
    const lowerName = name.toLowerCase();
    const lowerPattern = pattern.toLowerCase();
    if (lowerPattern === '*') return true;
    if (lowerPattern.startsWith('*')) return lowerName.endsWith(lowerPattern.slice(1));
    if (lowerPattern.endsWith('*')) return lowerName.startsWith(lowerPattern.slice(0, -1));
    return lowerName === lowerPattern;
}

export async function copyDirectory(
    sourceDir: string,
    destDir: string,
    excludePatterns: readonly string[] = []
): Promise<void> {
    await fs.copy(sourceDir, destDir, {
        filter: (src) => {
            if (src === sourceDir) return true;
            const name = path.basename(src);
            return !excludePatterns.some((pattern) => matchesPattern(name, pattern));
        }
    });
}
