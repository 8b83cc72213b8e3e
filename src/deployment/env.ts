import fs from 'fs-extra';
import path from 'path';
import dotenv from 'dotenv';
import { BuildContext, executeWithOutput } from './builder';
import { DeploymentTarget } from './config';
import { Logger } from './logger';

const LOCAL_ADDRESS_MARKERS = ['localhost', '127.0.0.1', '192.168.'];

/**
 * Reads the project's .env file, or undefined when there is none.
 */
export async function readEnvFile(projectDir: string): Promise<Record<string, string> | undefined> {
    const envPath = path.join(projectDir, '.env');
    if (!(await fs.pathExists(envPath))) {
        return undefined;
    }
    const envContent = await fs.readFile(envPath, 'utf-8');
    return dotenv.parse(envContent);
}

/**
 * Drops values pointing at the developer's machine; they cannot work once deployed.
 */
export function filterDeployableSettings(env: Record<string, string>, logger: Logger): Record<string, string> {
    const safeEnv: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (LOCAL_ADDRESS_MARKERS.some((marker) => value.includes(marker))) {
            logger.warn(`Ignoring env var ${key}: it points at a local address`);
            continue;
        }
        safeEnv[key] = value;
    }
    return safeEnv;
}

export function buildAppSettingsArgs(target: DeploymentTarget, settings: Record<string, string>): string[] {
    return [
        'webapp',
        'config',
        'appsettings',
        'set',
        '-g',
        target.resourceGroup,
        '-n',
        target.appName,
        '--settings',
        ...Object.entries(settings).map(([key, value]) => `${key}=${value}`)
    ];
}

/**
 * Pushes the .env entries to the web app's settings with a single `az` call.
 * A project without a .env file, or with an empty one, needs nothing and succeeds.
 */
export async function convertEnvToAppSettings(
    projectDir: string,
    target: DeploymentTarget,
    verbose: boolean,
    ctx: BuildContext
): Promise<boolean> {
    const fileEnv = await readEnvFile(projectDir);
    if (!fileEnv) {
        ctx.logger.info('No .env file found to convert to app settings');
        return true;
    }

    ctx.logger.info('Converting .env file to app settings...');
    const settings = filterDeployableSettings(fileEnv, ctx.logger);
    const count = Object.keys(settings).length;
    if (count === 0) {
        ctx.logger.info('No valid environment variables found in .env file');
        return true;
    }

    ctx.logger.info(`Setting ${count} environment variables as app settings...`);
    const result = await executeWithOutput(ctx, 'az', buildAppSettingsArgs(target, settings), projectDir, verbose);
    if (!result.success) {
        ctx.logger.error(`Failed to set app settings: ${result.stderr.trim()}`);
        return false;
    }

    ctx.logger.info(`Converted ${count} environment variables to app settings`);
    return true;
}
