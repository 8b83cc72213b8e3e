import fs from 'fs-extra';
import path from 'path';
import { BuildContext, commandFailure, executeWithOutput } from './builder';
import { StepResult, ok } from './errors';

export type PackageManager = 'npm' | 'pnpm' | 'yarn';

export interface InstallPlan {
    manager: PackageManager;
    args: string[];
    fallbackArgs?: string[]; // Tried once when the first attempt fails
}

export const LOCK_FILES = ['package-lock.json', 'yarn.lock', 'pnpm-lock.yaml'];

/**
 * Chooses the package manager from the lock file the project ships.
 */
export async function planInstall(rootPath: string): Promise<InstallPlan> {
    if (await fs.pathExists(path.join(rootPath, 'pnpm-lock.yaml'))) {
        return { manager: 'pnpm', args: ['install', '--frozen-lockfile'] };
    }
    if (await fs.pathExists(path.join(rootPath, 'yarn.lock'))) {
        return { manager: 'yarn', args: ['install', '--frozen-lockfile'] };
    }
    if (await fs.pathExists(path.join(rootPath, 'package-lock.json'))) {
        // npm ci refuses lock files that drifted from package.json
        return { manager: 'npm', args: ['ci'], fallbackArgs: ['install'] };
    }
    return { manager: 'npm', args: ['install'] };
}

/**
 * Installs dependencies for the project and resolves to the package manager used.
 */
export async function installDependencies(
    rootPath: string,
    verbose: boolean,
    ctx: BuildContext
): Promise<StepResult<PackageManager>> {
    const plan = await planInstall(rootPath);
    ctx.logger.info(`Installing dependencies using ${plan.manager}...`);

    let args = plan.args;
    let result = await executeWithOutput(ctx, plan.manager, args, rootPath, verbose);

    if (!result.success && plan.fallbackArgs && !ctx.signal?.aborted) {
        ctx.logger.warn(`${plan.manager} ${args.join(' ')} failed, trying ${plan.manager} ${plan.fallbackArgs.join(' ')}...`);
        args = plan.fallbackArgs;
        result = await executeWithOutput(ctx, plan.manager, args, rootPath, verbose);
    }

    if (!result.success) {
        return commandFailure(ctx, 'restore', plan.manager, args, result, [
            `Run '${plan.manager} ${args.join(' ')}' locally and fix the reported dependency errors.`,
            'Make sure private registries are reachable from this machine.'
        ]);
    }

    return ok(plan.manager);
}
