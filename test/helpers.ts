/**
 * Shared test helpers: temp project directories, a spy logger and an in-process
 * CommandExecutor that records calls instead of spawning anything.
 */

import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import type { BuildContext } from '../src/deployment/builder';
import type { CommandExecutor, CommandResult } from '../src/deployment/executor';

export interface RecordedCall {
  program: string;
  args: string[];
  cwd?: string;
  streaming: boolean;
}

export type CommandHandler = (
  call: RecordedCall
) => Partial<CommandResult> | undefined | Promise<Partial<CommandResult> | undefined>;

export interface FakeExecutor extends CommandExecutor {
  calls: RecordedCall[];
}

export function commandLine(call: RecordedCall): string {
  return [call.program, ...call.args].join(' ');
}

/**
 * Every command succeeds with empty output unless the handler says otherwise.
 */
export function createFakeExecutor(handler: CommandHandler = () => undefined): FakeExecutor {
  const calls: RecordedCall[] = [];

  const run = async (call: RecordedCall): Promise<CommandResult> => {
    calls.push(call);
    const partial = (await handler(call)) ?? {};
    const exitCode = partial.exitCode ?? (partial.success === false ? 1 : 0);
    return {
      success: partial.success ?? exitCode === 0,
      exitCode,
      stdout: partial.stdout ?? '',
      stderr: partial.stderr ?? '',
    };
  };

  return {
    calls,
    execute: (program, args, options = {}) =>
      run({ program, args: [...args], cwd: options.cwd, streaming: false }),
    executeStreaming: (program, args, options = {}) =>
      run({ program, args: [...args], cwd: options.cwd, streaming: true }),
  };
}

export function createSpyLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function createContext(executor: CommandExecutor = createFakeExecutor()): BuildContext & {
  logger: ReturnType<typeof createSpyLogger>;
} {
  return { executor, logger: createSpyLogger() };
}

export async function makeTempDir(prefix = 'buildpilot-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Writes files relative to `root`; directories are created as needed.
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.ensureDir(path.dirname(target));
    await fs.writeFile(target, content);
  }
}

export async function listFilesRecursive(root: string, base = root): Promise<string[]> {
  const result: string[] = [];
  for (const entry of await fs.readdir(root, { withFileTypes: true })) {
    const full = path.join(root, entry.name);
    if (entry.isDirectory()) {
      result.push(...(await listFilesRecursive(full, base)));
    } else {
      result.push(path.relative(base, full).split(path.sep).join('/'));
    }
  }
  return result.sort();
}

export function loggedMessages(mock: ReturnType<typeof vi.fn>): string[] {
  return mock.mock.calls.map((call) => String(call[0]));
}
