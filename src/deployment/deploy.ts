import path from 'path';
import { detectPlatform } from './analyzer';
import { BuildContext, PlatformBuilder } from './builder';
import { BuildConfig, ProjectPlatform } from './config';
import { dotnetBuilder } from './dotnet';
import { BuildErrorKind, BuildStep, fail, fileFailure, ok, StepError, StepResult } from './errors';
import { Manifest, writeManifest } from './manifest';
import { nodeBuilder } from './node';
import { createDeploymentPackage } from './package';
import { pythonBuilder } from './python';

export type BuilderTable = Readonly<Partial<Record<ProjectPlatform, PlatformBuilder>>>;

export const PLATFORM_BUILDERS: BuilderTable = {
    [ProjectPlatform.DOTNET]: dotnetBuilder,
    [ProjectPlatform.NODEJS]: nodeBuilder,
    [ProjectPlatform.PYTHON]: pythonBuilder
};

export interface PipelineResult {
    platform: ProjectPlatform;
    artifactPath: string;
    manifest: Manifest;
    manifestPath: string;
    packagePath?: string;
}

function cancelled(step: BuildStep): StepError {
    return fail(BuildErrorKind.CANCELLED, step, `Build pipeline was cancelled before the ${step} step`);
}

/**
 * Runs one step, turning a thrown filesystem error into a failure for that step.
 */
async function guarded<T>(step: BuildStep, work: () => Promise<StepResult<T>>): Promise<StepResult<T>> {
    try {
        return await work();
    } catch (error) {
        return fileFailure(step, error);
    }
}

/**
 * Main entry point for building a project.
 *
 * Flow:
 * 1. Detect platform (unless configured)
 * 2. Validate toolchain
 * 3. Clean
 * 4. Build into the artifact directory
 * 5. Create and write the manifest
 * 6. Convert .env to app settings (when a deployment target is configured)
 * 7. Zip the artifact (when a package name is configured)
 *
 * Stops at the first failing step and reports which one failed. Builds of different
 * projects may run in parallel; two runs against the same project must not.
 */
export async function runBuildPipeline(
    config: BuildConfig,
    ctx: BuildContext,
    builders: BuilderTable = PLATFORM_BUILDERS
): Promise<StepResult<PipelineResult>> {
    const { logger, signal } = ctx;
    const projectDir = path.resolve(config.projectPath);
    logger.info(`Starting build for ${projectDir}...`);

    // 1. Detect
    const detected = config.platform
        ? ok(config.platform)
        : await guarded('detect', async () => ok(await detectPlatform(projectDir, logger)));
    if (!detected.success) return detected;
    const platform = detected.value;
    if (platform === ProjectPlatform.UNKNOWN) {
        return fail(BuildErrorKind.PLATFORM_UNDETECTED, 'detect', `Could not detect project platform in ${projectDir}`, {
            mitigation: [
                'Ensure the directory contains .NET project files (.csproj), Node.js files (package.json) or Python files (requirements.txt, *.py).',
                'In a repository with several projects, point the build at the project subdirectory.'
            ]
        });
    }
    logger.info(`Project platform: ${platform}`);

    const builder = builders[platform];
    if (!builder) {
        return fail(BuildErrorKind.UNSUPPORTED_PLATFORM, 'detect', `Platform ${platform} is not supported for builds`);
    }

    const total = 4 + (config.deploymentTarget ? 1 : 0) + (config.deploymentZip ? 1 : 0);
    let current = 0;
    const announce = (message: string) => logger.info(`[${++current}/${total}] ${message}`);

    // 2. Validate
    if (signal?.aborted) return cancelled('validate');
    announce(`Validating ${platform} environment...`);
    const validated = await guarded('validate', async () => ok(await builder.validateEnvironment(ctx)));
    if (!validated.success) return validated;
    if (!validated.value) {
        return fail(BuildErrorKind.ENVIRONMENT_MISSING, 'validate', `Environment validation failed for ${platform}`, {
            mitigation: ['Install the missing toolchain reported above, then re-run the build.']
        });
    }

    // 3. Clean
    if (signal?.aborted) return cancelled('clean');
    announce(`Cleaning ${platform} project...`);
    const cleaned = await guarded('clean', () => builder.clean(projectDir, ctx));
    if (!cleaned.success) return cleaned;

    // 4. Build
    if (signal?.aborted) return cancelled('publish');
    announce(`Building ${platform} application...`);
    const built = await guarded('publish', () => builder.build(projectDir, config.outputPath, config.verbose, ctx));
    if (!built.success) return built;
    const artifactPath = built.value;
    logger.info(`Build output: ${artifactPath}`);

    // 5. Manifest
    if (signal?.aborted) return cancelled('manifest');
    announce('Creating manifest...');
    const created = await guarded<{ manifest: Manifest; manifestPath: string }>('manifest', async () => {
        const result = await builder.createManifest(projectDir, artifactPath, ctx);
        if (!result.success) return result;
        return ok({ manifest: result.value, manifestPath: await writeManifest(result.value, artifactPath) });
    });
    if (!created.success) return created;
    const { manifest, manifestPath } = created.value;
    logger.info(`Manifest command: ${manifest.command}`);

    // 6. App settings
    if (config.deploymentTarget) {
        if (signal?.aborted) return cancelled('settings');
        announce('Converting .env to app settings...');
        const target = config.deploymentTarget;
        const converted = await guarded('settings', async () =>
            ok(await builder.convertEnvironmentToDeploymentSettings(projectDir, target, config.verbose, ctx))
        );
        if (!converted.success) {
            logger.warn(`Failed to convert environment variables (${converted.error.message}), but continuing`);
        } else if (!converted.value) {
            logger.warn('Failed to convert environment variables, but continuing');
        }
    }

    // 7. Package
    let packagePath: string | undefined;
    if (config.deploymentZip) {
        if (signal?.aborted) return cancelled('package');
        announce('Creating deployment package...');
        const zipName = config.deploymentZip;
        const packaged = await guarded('package', async () =>
            ok(await createDeploymentPackage(projectDir, artifactPath, zipName, logger))
        );
        if (!packaged.success) return packaged;
        packagePath = packaged.value;
    }

    logger.info('Build successful!');
    return ok({ platform, artifactPath, manifest, manifestPath, packagePath });
}
