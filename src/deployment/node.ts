import fs from 'fs-extra';
import path from 'path';
import { listTopLevelFiles, hasExtension } from './analyzer';
import {
    BuildContext,
    commandFailure,
    copyDirectory,
    executeWithOutput,
    PlatformBuilder,
    removeArtifact,
    resolveArtifactPath,
    verifyArtifact,
    writeDeploymentFile
} from './builder';
import { DEFAULT_NODE_VERSION, NODE_SOURCE_EXTENSIONS, ProjectPlatform } from './config';
import { convertEnvToAppSettings } from './env';
import { BuildErrorKind, BuildStep, fail, ok, StepResult } from './errors';
import { installDependencies, LOCK_FILES, planInstall } from './installer';
import { createManifest } from './manifest';

export interface PackageJson {
    scripts: Record<string, string>;
    main?: string;
    engines: { node?: string };
}

const COMMON_ENTRY_POINTS = ['server.js', 'app.js', 'index.js', 'main.js'];
const COPIED_FILES = ['package.json', ...LOCK_FILES, 'tsconfig.json'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringEntries(value: unknown): Record<string, string> {
    const entries: Record<string, string> = {};
    if (!isRecord(value)) return entries;
    for (const [key, entry] of Object.entries(value)) {
        if (typeof entry === 'string') entries[key] = entry;
    }
    return entries;
}

export function parsePackageJson(raw: unknown): PackageJson {
    const pkg = isRecord(raw) ? raw : {};
    const engines = stringEntries(pkg['engines']);
    const main = pkg['main'];
    return {
        scripts: stringEntries(pkg['scripts']),
        main: typeof main === 'string' && main.trim() ? main : undefined,
        engines: { node: engines['node'] }
    };
}

async function loadPackageJson(projectDir: string, step: BuildStep): Promise<StepResult<PackageJson>> {
    const pkgPath = path.join(projectDir, 'package.json');
    if (!(await fs.pathExists(pkgPath))) {
        return fail(BuildErrorKind.PROJECT_NOT_FOUND, step, `No package.json found in ${projectDir}`, {
            mitigation: ['Run the build from the directory that holds package.json.']
        });
    }

    try {
        const raw: unknown = await fs.readJson(pkgPath);
        return ok(parsePackageJson(raw));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return fail(BuildErrorKind.PROJECT_NOT_FOUND, step, `package.json could not be parsed: ${reason}`, {
            mitigation: ['Fix the JSON syntax in package.json.']
        });
    }
}

export function detectNodeVersion(pkg: PackageJson): string {
    const match = pkg.engines.node ? /(\d+)/.exec(pkg.engines.node) : null;
    return match ? match[1] : DEFAULT_NODE_VERSION;
}

/**
 * The file the app starts from: the script of a `node <file>` start script, else `main`.
 */
export function entryFileOf(pkg: PackageJson): string | undefined {
    const startScript = pkg.scripts['start']?.trim();
    if (startScript) {
        const match = /^node\s+([^\s-]\S*)/.exec(startScript);
        return match ? match[1] : undefined;
    }
    return pkg.main;
}

async function entryExists(artifactPath: string, entryFile: string): Promise<boolean> {
    const target = path.join(artifactPath, entryFile);
    // `main` may leave out the extension
    return (await fs.pathExists(target)) || (await fs.pathExists(`${target}.js`));
}

/**
 * Copies whatever holds the entry file when the fixed copy set misses it:
 * the file itself at the top level, else its top-level directory.
 */
async function copyEntry(projectDir: string, artifactPath: string, entryFile: string, ctx: BuildContext): Promise<void> {
    const [topLevel, ...rest] = path.normalize(entryFile).split(path.sep);
    if (!topLevel || topLevel === '..' || topLevel === 'node_modules') return;

    const source = path.join(projectDir, topLevel);
    const destination = path.join(artifactPath, topLevel);
    if (source === artifactPath || (await fs.pathExists(destination)) || !(await fs.pathExists(source))) return;

    ctx.logger.info(`Copying ${topLevel}${rest.length > 0 ? '/' : ''} for entry point ${entryFile}`);
    if (rest.length > 0) {
        await copyDirectory(source, destination);
    } else {
        await fs.copy(source, destination);
    }
}

async function copyPublishFiles(
    projectDir: string,
    artifactPath: string,
    pkg: PackageJson,
    ctx: BuildContext
): Promise<void> {
    ctx.logger.info('Preparing deployment package...');

    for (const file of COPIED_FILES) {
        const source = path.join(projectDir, file);
        if (await fs.pathExists(source)) {
            await fs.copy(source, path.join(artifactPath, file));
        }
    }

    const srcDir = path.join(projectDir, 'src');
    if (await fs.pathExists(srcDir)) {
        await copyDirectory(srcDir, path.join(artifactPath, 'src'));
    }

    // Server entry files in the project root
    for (const file of await listTopLevelFiles(projectDir)) {
        if (hasExtension(file, NODE_SOURCE_EXTENSIONS)) {
            await fs.copy(path.join(projectDir, file), path.join(artifactPath, file));
        }
    }

    const distDir = path.join(projectDir, 'dist');
    if (distDir !== artifactPath && (await fs.pathExists(distDir))) {
        ctx.logger.info('Found dist folder, copying to publish output...');
        await copyDirectory(distDir, path.join(artifactPath, 'dist'));
    } else {
        ctx.logger.info('No dist folder found in project; relying on the server-side build for runtime output.');
    }

    const entryFile = entryFileOf(pkg);
    if (entryFile) {
        await copyEntry(projectDir, artifactPath, entryFile, ctx);
    }
}

export const nodeBuilder: PlatformBuilder = {
    platform: ProjectPlatform.NODEJS,

    async validateEnvironment(ctx) {
        ctx.logger.info('Validating Node.js environment...');

        const node = await ctx.executor.execute('node', ['--version'], { signal: ctx.signal });
        if (!node.success) {
            ctx.logger.error('Node.js not found. Please install Node.js from https://nodejs.org/');
            return false;
        }

        const npm = await ctx.executor.execute('npm', ['--version'], { signal: ctx.signal });
        if (!npm.success) {
            ctx.logger.error('npm not found. Please install Node.js which includes npm.');
            return false;
        }

        ctx.logger.info(`Node.js version: ${node.stdout.trim()}`);
        ctx.logger.info(`npm version: ${npm.stdout.trim()}`);
        return true;
    },

    async clean(projectDir, ctx) {
        ctx.logger.info('Cleaning Node.js project...');

        const pkg = await loadPackageJson(projectDir, 'clean');
        if (!pkg.success) return pkg;

        const nodeModulesPath = path.join(projectDir, 'node_modules');
        if (await fs.pathExists(nodeModulesPath)) {
            ctx.logger.info('Removing node_modules directory...');
            await fs.remove(nodeModulesPath);
        }
        return ok(undefined);
    },

    async build(projectDir, outputPath, verbose, ctx) {
        ctx.logger.info('Building Node.js project...');

        const pkg = await loadPackageJson(projectDir, 'resolve');
        if (!pkg.success) return pkg;

        const install = await installDependencies(projectDir, verbose, ctx);
        if (!install.success) return install;
        const manager = install.value;

        const artifactPath = resolveArtifactPath(projectDir, outputPath);
        await removeArtifact(artifactPath, ctx.logger);

        if (pkg.value.scripts['build']) {
            ctx.logger.info('Running build script...');
            const buildArgs = ['run', 'build'];
            const buildResult = await executeWithOutput(ctx, manager, buildArgs, projectDir, verbose);
            if (!buildResult.success) {
                return commandFailure(ctx, 'compile', manager, buildArgs, buildResult, [
                    `Run '${manager} run build' locally in the project directory and fix the reported errors.`,
                    "Verify that the 'build' script is defined correctly in package.json."
                ]);
            }
        } else {
            ctx.logger.info('No build script found, skipping build step');
        }

        await fs.ensureDir(artifactPath);
        await copyPublishFiles(projectDir, artifactPath, pkg.value, ctx);
        await writeDeploymentFile(artifactPath, ctx.logger);

        return verifyArtifact(artifactPath);
    },

    async createManifest(projectDir, artifactPath, ctx) {
        ctx.logger.info('Creating manifest for Node.js...');

        const loaded = await loadPackageJson(projectDir, 'manifest');
        if (!loaded.success) return loaded;
        const pkg = loaded.value;

        const version = detectNodeVersion(pkg);
        const startScript = pkg.scripts['start']?.trim();

        let command: string | undefined;
        if (startScript) {
            command = startScript;
            ctx.logger.info(`Detected start command from package.json: ${command}`);
        } else if (pkg.main) {
            command = `node ${pkg.main}`;
            ctx.logger.info(`Detected start command from main property: ${command}`);
        } else {
            for (const entryPoint of COMMON_ENTRY_POINTS) {
                if (await fs.pathExists(path.join(artifactPath, entryPoint))) {
                    command = `node ${entryPoint}`;
                    ctx.logger.info(`Detected entry point in publish folder: ${command}`);
                    break;
                }
            }
        }

        const entryFile = entryFileOf(pkg);
        if (command && entryFile && !(await entryExists(artifactPath, entryFile))) {
            return fail(
                BuildErrorKind.MANIFEST_DETECTION_FAILED,
                'manifest',
                `Start command '${command}' needs ${entryFile}, which is not in the build output ${artifactPath}`,
                {
                    mitigation: [
                        `Make sure the build writes ${entryFile}, or point 'main'/'start' at a file that is published.`
                    ]
                }
            );
        }

        if (!command) {
            return fail(
                BuildErrorKind.MANIFEST_DETECTION_FAILED,
                'manifest',
                'Could not determine how to start the Node.js application.',
                {
                    mitigation: [
                        "Add a 'start' script or a 'main' entry to package.json.",
                        `Or ship one of ${COMMON_ENTRY_POINTS.join(', ')} in the project root.`
                    ]
                }
            );
        }

        const buildCommand = pkg.scripts['build'] ? `${(await planInstall(projectDir)).manager} run build` : undefined;
        return ok(createManifest(ProjectPlatform.NODEJS, version, command, buildCommand));
    },

    convertEnvironmentToDeploymentSettings(projectDir, target, verbose, ctx) {
        return convertEnvToAppSettings(projectDir, target, verbose, ctx);
    }
};
