import fs from 'fs-extra';
import path from 'path';
import { hasExtension, listTopLevelFiles } from './analyzer';
import {
    BuildContext,
    commandFailure,
    copyDirectory,
    executeWithOutput,
    matchesPattern,
    PlatformBuilder,
    removeArtifact,
    resolveArtifactPath,
    verifyArtifact,
    writeDeploymentFile
} from './builder';
import {
    DEFAULT_PYTHON_VERSION,
    IGNORED_DIRS,
    ProjectPlatform,
    PYTHON_MARKER_FILES,
    PYTHON_SOURCE_EXTENSIONS
} from './config';
import { convertEnvToAppSettings } from './env';
import { BuildErrorKind, BuildStep, fail, ok, StepError } from './errors';
import { Logger } from './logger';
import { createManifest } from './manifest';
import { findPythonExecutable } from './python-locator';

const CLEANED_DIRS = [
    '__pycache__',
    '.pytest_cache',
    '*.egg-info',
    'build',
    '.venv*',
    'venv',
    '.virtual',
    'env',
    '.mypy_cache',
    'htmlcov',
    '.tox',
    'dist_temp'
];
const CLEANED_FILES = ['uv.lock', '.coverage', '.env_backup'];

// .env stays behind: secrets go through app settings, never the package
const COPY_EXCLUDES = [
    '__pycache__',
    '.git',
    '.venv*',
    'venv',
    '.virtual',
    'env',
    'node_modules',
    '.vs',
    '.vscode',
    '*.pyc',
    '.env',
    '.pytest_cache',
    'app.zip',
    'uv.lock'
];

// Deployment packages written next to the project by earlier runs
const TOP_LEVEL_EXCLUDES = ['*.zip'];

const LOCAL_PACKAGE_REQUIREMENTS = '--find-links dist\n--pre\n-e .\n';

// Checked in order against the artifact's top-level files
const ENTRY_POINTS: ReadonlyArray<[string, string]> = [
    ['app.py', 'gunicorn --bind=0.0.0.0:8000 app:app'],
    ['main.py', 'python main.py'],
    ['start.py', 'python start.py'],
    ['server.py', 'python server.py'],
    ['run.py', 'python run.py'],
    ['wsgi.py', 'gunicorn --bind=0.0.0.0:8000 wsgi:application'],
    ['asgi.py', 'uvicorn asgi:application --host 0.0.0.0 --port 8000']
];

function isPythonProject(files: readonly string[]): boolean {
    return files.some((file) => PYTHON_MARKER_FILES.includes(file) || hasExtension(file, PYTHON_SOURCE_EXTENSIONS));
}

function pythonFiles(files: readonly string[]): string[] {
    return files.filter((file) => hasExtension(file, PYTHON_SOURCE_EXTENSIONS)).sort();
}

function projectNotFound(step: BuildStep, projectDir: string): StepError {
    return fail(BuildErrorKind.PROJECT_NOT_FOUND, step, `No Python project files found in ${projectDir}`, {
        mitigation: ['Run the build from the directory that holds requirements.txt, pyproject.toml, setup.py or the .py sources.']
    });
}

function pythonMissing(): StepError {
    return fail(BuildErrorKind.ENVIRONMENT_MISSING, 'validate', 'Python executable could not be located.', {
        mitigation: ['Install Python from https://www.python.org/ and make sure it is on PATH.']
    });
}

async function removeQuietly(target: string, logger: Logger): Promise<void> {
    try {
        logger.debug(`Removing ${path.basename(target)}...`);
        await fs.remove(target);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.debug(`Could not remove ${path.basename(target)}: ${reason}`);
    }
}

async function findFiles(dir: string, extension: string): Promise<string[]> {
    const found: string[] = [];
    for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            if (!IGNORED_DIRS.includes(entry.name)) {
                found.push(...(await findFiles(fullPath, extension)));
            }
        } else if (entry.name.endsWith(extension)) {
            found.push(fullPath);
        }
    }
    return found;
}

async function copyProjectFiles(projectDir: string, artifactPath: string): Promise<void> {
    for (const name of await fs.readdir(projectDir)) {
        if (COPY_EXCLUDES.some((pattern) => matchesPattern(name, pattern))) continue;
        if (TOP_LEVEL_EXCLUDES.some((pattern) => matchesPattern(name, pattern))) continue;

        const source = path.join(projectDir, name);
        // Never copy the artifact into itself
        if (source === artifactPath || artifactPath.startsWith(`${source}${path.sep}`)) continue;

        // Links are copied as links, dangling ones included
        const stat = await fs.lstat(source);
        if (stat.isDirectory()) {
            await copyDirectory(source, path.join(artifactPath, name), COPY_EXCLUDES);
        } else {
            await fs.copy(source, path.join(artifactPath, name));
        }
    }
}

async function countWheels(distDir: string): Promise<number> {
    if (!(await fs.pathExists(distDir))) return 0;
    return (await fs.readdir(distDir)).filter((file) => file.endsWith('.whl')).length;
}

/**
 * Packaged projects (pyproject.toml / setup.py) are installed from local wheels on the
 * host. Builds the wheels into the artifact when none were shipped; a failed `uv build`
 * only warns.
 */
async function prepareLocalPackages(
    projectDir: string,
    artifactPath: string,
    verbose: boolean,
    ctx: BuildContext
): Promise<void> {
    const packaged =
        (await fs.pathExists(path.join(projectDir, 'pyproject.toml'))) ||
        (await fs.pathExists(path.join(projectDir, 'setup.py')));
    if (!packaged) return;

    const distDir = path.join(artifactPath, 'dist');
    const existing = await countWheels(distDir);
    if (existing > 0) {
        ctx.logger.info(`Found ${existing} existing wheel files in publish/dist`);
    } else {
        ctx.logger.info('No local packages found in publish/dist, running uv build...');
        const result = await executeWithOutput(ctx, 'uv', ['build'], artifactPath, verbose);
        if (result.success) {
            ctx.logger.info(`Built ${await countWheels(distDir)} local packages in publish directory`);
        } else {
            ctx.logger.warn(`uv build failed: ${result.stderr.trim()}. Continuing without local packages.`);
        }
    }

    if (!(await fs.pathExists(path.join(projectDir, 'requirements.txt')))) {
        await fs.writeFile(path.join(artifactPath, 'requirements.txt'), LOCAL_PACKAGE_REQUIREMENTS);
        ctx.logger.info('Created requirements.txt installing the local package');
    }
}

/**
 * Declared runtime version: runtime.txt ("python-3.12"), then .python-version ("3.12.1"),
 * else the fixed default.
 */
export async function detectPythonVersion(projectDir: string, logger: Logger): Promise<string> {
    const runtimePath = path.join(projectDir, 'runtime.txt');
    if (await fs.pathExists(runtimePath)) {
        const match = /python-(\d+\.\d+)/.exec(await fs.readFile(runtimePath, 'utf-8'));
        if (match) {
            logger.info(`Detected Python version from runtime.txt: ${match[1]}`);
            return match[1];
        }
    }

    const pinPath = path.join(projectDir, '.python-version');
    if (await fs.pathExists(pinPath)) {
        const match = /(\d+\.\d+)/.exec(await fs.readFile(pinPath, 'utf-8'));
        if (match) {
            logger.info(`Detected Python version from .python-version: ${match[1]}`);
            return match[1];
        }
    }

    logger.info(`No Python version declared; using default ${DEFAULT_PYTHON_VERSION}`);
    return DEFAULT_PYTHON_VERSION;
}

/**
 * Works out the start command from the artifact's top-level Python files.
 * Returns undefined when several files are present and none stands out.
 */
export async function detectStartCommand(artifactPath: string, logger: Logger): Promise<string | undefined> {
    const files = pythonFiles(await listTopLevelFiles(artifactPath));

    for (const [file, command] of ENTRY_POINTS) {
        if (files.includes(file)) {
            logger.info(`Detected entry point: ${file}, using command: ${command}`);
            return command;
        }
    }

    for (const file of files) {
        const content = await fs.readFile(path.join(artifactPath, file), 'utf-8');
        const moduleName = path.parse(file).name;

        if (content.includes('Flask(') || content.includes('from flask import')) {
            logger.info(`Detected Flask application in ${file}`);
            return `gunicorn --bind=0.0.0.0:8000 ${moduleName}:app`;
        }
        if (content.includes('FastAPI(') || content.includes('from fastapi import')) {
            logger.info(`Detected FastAPI application in ${file}`);
            return `uvicorn ${moduleName}:app --host 0.0.0.0 --port 8000`;
        }
        if (content.includes('django')) {
            logger.info('Detected Django application');
            return 'gunicorn --bind=0.0.0.0:8000 wsgi:application';
        }
        if (content.includes('if __name__ == "__main__":') || content.includes('def main(')) {
            logger.info(`Detected main function in ${file}`);
            return `python ${file}`;
        }
    }

    if (files.length === 1) {
        logger.warn(`Could not detect a specific entry point. Using the only Python file: ${files[0]}`);
        return `python ${files[0]}`;
    }
    return undefined;
}

export const pythonBuilder: PlatformBuilder = {
    platform: ProjectPlatform.PYTHON,

    async validateEnvironment(ctx) {
        ctx.logger.info('Validating Python environment...');

        const pythonExe = await findPythonExecutable(ctx);
        if (!pythonExe) {
            ctx.logger.error('Python not found. Please install Python from https://www.python.org/');
            return false;
        }

        const python = await ctx.executor.execute(pythonExe, ['--version'], { signal: ctx.signal });
        if (!python.success) {
            ctx.logger.error('Python not found. Please install Python from https://www.python.org/');
            return false;
        }

        const pip = await ctx.executor.execute(pythonExe, ['-m', 'pip', '--version'], { signal: ctx.signal });
        if (!pip.success) {
            ctx.logger.error('pip not found. Please ensure pip is installed with Python.');
            return false;
        }

        ctx.logger.info(`Python version: ${python.stdout.trim()}`);
        ctx.logger.info(`pip version: ${pip.stdout.trim()}`);
        return true;
    },

    async clean(projectDir, ctx) {
        ctx.logger.debug('Cleaning Python project...');

        if (!isPythonProject(await listTopLevelFiles(projectDir))) {
            return projectNotFound('clean', projectDir);
        }

        for (const entry of await fs.readdir(projectDir, { withFileTypes: true })) {
            const target = path.join(projectDir, entry.name);
            if (entry.isDirectory() && CLEANED_DIRS.some((pattern) => matchesPattern(entry.name, pattern))) {
                await removeQuietly(target, ctx.logger);
            } else if (entry.isFile() && CLEANED_FILES.includes(entry.name)) {
                await removeQuietly(target, ctx.logger);
            }
        }

        for (const pycFile of await findFiles(projectDir, '.pyc')) {
            await removeQuietly(pycFile, ctx.logger);
        }

        return ok(undefined);
    },

    async build(projectDir, outputPath, verbose, ctx) {
        const files = await listTopLevelFiles(projectDir);
        if (!isPythonProject(files)) {
            return projectNotFound('resolve', projectDir);
        }

        const pythonExe = await findPythonExecutable(ctx);
        if (!pythonExe) return pythonMissing();

        ctx.logger.info('Building Python project...');
        // Catch syntax errors before anything is packaged
        for (const file of pythonFiles(files)) {
            const args = ['-m', 'py_compile', file];
            const result = await ctx.executor.execute(pythonExe, args, { cwd: projectDir, signal: ctx.signal });
            if (!result.success) {
                ctx.logger.error(`Python syntax error in ${file}:\n${result.stderr.trimEnd()}`);
                return commandFailure(ctx, 'compile', pythonExe, args, result, [`Fix the syntax error in ${file}.`]);
            }
        }

        const artifactPath = resolveArtifactPath(projectDir, outputPath);
        await removeArtifact(artifactPath, ctx.logger);
        await fs.ensureDir(artifactPath);

        ctx.logger.info('Copying project files...');
        await copyProjectFiles(projectDir, artifactPath);
        await prepareLocalPackages(projectDir, artifactPath, verbose, ctx);

        if (!(await fs.pathExists(path.join(projectDir, 'runtime.txt')))) {
            const version = await detectPythonVersion(projectDir, ctx.logger);
            await fs.writeFile(path.join(artifactPath, 'runtime.txt'), `python-${version}`);
        }
        await writeDeploymentFile(artifactPath, ctx.logger);
        ctx.logger.info('Excluded .env file from the package; set environment variables as app settings');

        return verifyArtifact(artifactPath);
    },

    async createManifest(projectDir, artifactPath, ctx) {
        ctx.logger.info('Creating manifest for Python...');

        const version = await detectPythonVersion(projectDir, ctx.logger);
        const command = await detectStartCommand(artifactPath, ctx.logger);
        if (!command) {
            return fail(
                BuildErrorKind.MANIFEST_DETECTION_FAILED,
                'manifest',
                'Could not determine the Python entry point.',
                {
                    mitigation: [
                        `Name the entry file one of ${ENTRY_POINTS.map(([file]) => file).join(', ')}.`,
                        'Or add an `if __name__ == "__main__":` guard to the entry file.'
                    ]
                }
            );
        }

        const buildCommand = (await fs.pathExists(path.join(artifactPath, 'requirements.txt')))
            ? 'pip install -r requirements.txt'
            : undefined;
        return ok(createManifest(ProjectPlatform.PYTHON, version, command, buildCommand));
    },

    convertEnvironmentToDeploymentSettings(projectDir, target, verbose, ctx) {
        return convertEnvToAppSettings(projectDir, target, verbose, ctx);
    }
};
