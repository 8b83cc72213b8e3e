import fs from 'fs-extra';
import path from 'path';
import { DEFAULT_DOTNET_VERSION, ProjectPlatform } from './config';
import {
    BuildContext,
    commandFailure,
    executeWithOutput,
    PlatformBuilder,
    removeArtifact,
    resolveArtifactPath,
    verifyArtifact
} from './builder';
import { compareMajorMinor, detectTargetRuntimeVersion, resolveProjectFile } from './dotnet-project';
import { BuildErrorKind, fail, ok, StepError, StepResult } from './errors';
import { createManifest, Manifest } from './manifest';

const DOTNET = 'dotnet';
const INSTALL_URL = 'https://dotnet.microsoft.com/download';

function projectNotFound(step: 'clean' | 'resolve', projectDir: string): StepError {
    return fail(BuildErrorKind.PROJECT_NOT_FOUND, step, `No .NET project file found in ${projectDir}`, {
        mitigation: ['Run the build from the directory that holds the .csproj, .fsproj or .vbproj file.']
    });
}

/**
 * A project targeting .NET X.Y needs an SDK of at least X.Y; newer SDKs build older
 * targets.
 */
async function checkSdkVersion(
    projectDir: string,
    projectFile: string,
    ctx: BuildContext
): Promise<StepResult<void>> {
    const projectFilePath = path.join(projectDir, projectFile);
    const required = await detectTargetRuntimeVersion(projectFilePath, ctx.logger);
    if (!required) return ok(undefined);

    const probe = await ctx.executor.execute(DOTNET, ['--version'], { signal: ctx.signal });
    const installed = probe.success ? probe.stdout.trim() : '';
    if (installed && compareMajorMinor(installed, required) >= 0) {
        return ok(undefined);
    }

    return fail(
        BuildErrorKind.ENVIRONMENT_MISSING,
        'validate',
        `The project targets .NET ${required}, but the required .NET SDK is not installed. ` +
            `Installed SDK version: ${installed || 'Not found'}`,
        {
            output: probe.success ? undefined : probe.stderr,
            mitigation: [
                `Install the .NET ${required} SDK from ${INSTALL_URL}`,
                'Restart your terminal after installation',
                'Re-run the build'
            ]
        }
    );
}

async function pickEntryAssembly(
    artifactPath: string,
    projectFile: string | undefined
): Promise<string | undefined> {
    const depsFiles = (await fs.readdir(artifactPath)).filter((file) => file.endsWith('.deps.json')).sort();
    const assemblyName = projectFile ? path.parse(projectFile).name : undefined;

    const match = assemblyName ? depsFiles.find((file) => file === `${assemblyName}.deps.json`) : undefined;
    const depsFile = match ?? (depsFiles.length === 1 ? depsFiles[0] : undefined);
    return depsFile ? `${depsFile.slice(0, -'.deps.json'.length)}.dll` : undefined;
}

export const dotnetBuilder: PlatformBuilder = {
    platform: ProjectPlatform.DOTNET,

    async validateEnvironment(ctx) {
        ctx.logger.info('Validating .NET environment...');

        const result = await ctx.executor.execute(DOTNET, ['--version'], { signal: ctx.signal });
        if (!result.success) {
            ctx.logger.error(`.NET SDK not found. Please install .NET SDK from ${INSTALL_URL}`);
            return false;
        }

        ctx.logger.info(`.NET SDK version: ${result.stdout.trim()}`);
        return true;
    },

    async clean(projectDir, ctx) {
        ctx.logger.info('Cleaning .NET project...');

        const projectFile = await resolveProjectFile(projectDir, ctx.logger);
        if (!projectFile) return projectNotFound('clean', projectDir);

        const args = ['clean', projectFile];
        const result = await ctx.executor.execute(DOTNET, args, { cwd: projectDir, signal: ctx.signal });
        if (!result.success) return commandFailure(ctx, 'clean', DOTNET, args, result);

        return ok(undefined);
    },

    async build(projectDir, outputPath, verbose, ctx) {
        ctx.logger.info('Building .NET project...');

        const projectFile = await resolveProjectFile(projectDir, ctx.logger);
        if (!projectFile) return projectNotFound('resolve', projectDir);

        const sdkCheck = await checkSdkVersion(projectDir, projectFile, ctx);
        if (!sdkCheck.success) return sdkCheck;

        ctx.logger.info('Restoring NuGet packages...');
        const restoreArgs = ['restore', projectFile];
        const restore = await executeWithOutput(ctx, DOTNET, restoreArgs, projectDir, verbose);
        if (!restore.success) {
            return commandFailure(ctx, 'restore', DOTNET, restoreArgs, restore, [
                'Check the package sources and network access, then run `dotnet restore` locally.'
            ]);
        }

        const artifactPath = resolveArtifactPath(projectDir, outputPath);
        await removeArtifact(artifactPath, ctx.logger);

        ctx.logger.info('Publishing .NET application...');
        const publishArgs = [
            'publish',
            projectFile,
            '-c',
            'Release',
            '-o',
            artifactPath,
            '--self-contained',
            'false',
            '--verbosity',
            'minimal'
        ];
        const publish = await executeWithOutput(ctx, DOTNET, publishArgs, projectDir, verbose);
        if (!publish.success) {
            ctx.logger.error(`dotnet publish failed with exit code ${publish.exitCode}`);
            return commandFailure(ctx, 'publish', DOTNET, publishArgs, publish, [
                'Fix the compiler errors reported above and re-run the build.'
            ]);
        }

        return verifyArtifact(artifactPath);
    },

    async createManifest(projectDir, artifactPath, ctx): Promise<StepResult<Manifest>> {
        ctx.logger.info('Creating manifest for .NET...');

        const projectFile = await resolveProjectFile(projectDir, ctx.logger);
        const entryDll = await pickEntryAssembly(artifactPath, projectFile);
        if (!entryDll) {
            return fail(
                BuildErrorKind.MANIFEST_DETECTION_FAILED,
                'manifest',
                'No unambiguous .deps.json file found. Cannot determine entry point.',
                { mitigation: [`Check that ${artifactPath} holds the output of a single application.`] }
            );
        }
        ctx.logger.info(`Detected entry point: ${entryDll}`);

        let version = projectFile
            ? await detectTargetRuntimeVersion(path.join(projectDir, projectFile), ctx.logger)
            : undefined;
        if (!version) {
            ctx.logger.info(`No target framework declared; using default .NET ${DEFAULT_DOTNET_VERSION}`);
            version = DEFAULT_DOTNET_VERSION;
        }

        return ok(createManifest(ProjectPlatform.DOTNET, version, `dotnet ${entryDll}`));
    },

    async convertEnvironmentToDeploymentSettings() {
        // The runtime reads appsettings.json; nothing to publish.
        return true;
    }
};
