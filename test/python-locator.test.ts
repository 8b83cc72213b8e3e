/**
 * Python Locator Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { findPythonExecutable } from '../src/deployment/python-locator';
import { commandLine, createContext, createFakeExecutor, makeTempDir, writeFiles } from './helpers';

describe('findPythonExecutable', () => {
  let dir: string;

  beforeEach(async (): Promise<void> => {
    dir = await makeTempDir();
  });

  afterEach(async (): Promise<void> => {
    vi.unstubAllEnvs();
    await fs.remove(dir);
  });

  it('returns the first existing path reported by which', async (): Promise<void> => {
    const python = path.join(dir, 'python3');
    await writeFiles(dir, { python3: '' });
    const executor = createFakeExecutor(() => ({ stdout: `${python}\n/usr/bin/python3\n` }));

    expect(await findPythonExecutable(createContext(executor), 'linux')).toBe(python);
    expect(executor.calls.map(commandLine)).toEqual(['which python3']);
  });

  it('skips a reported path that does not exist', async (): Promise<void> => {
    const python = path.join(dir, 'python');
    await writeFiles(dir, { python: '' });
    const executor = createFakeExecutor((call) =>
      call.args[0] === 'python3' ? { stdout: path.join(dir, 'gone', 'python3') } : { stdout: python }
    );

    expect(await findPythonExecutable(createContext(executor), 'linux')).toBe(python);
    expect(executor.calls.map(commandLine)).toEqual(['which python3', 'which python']);
  });

  it('uses where on Windows and falls back to known install locations', async (): Promise<void> => {
    vi.stubEnv('LOCALAPPDATA', dir);
    await writeFiles(dir, { 'Microsoft/WindowsApps/python.exe': '' });
    const executor = createFakeExecutor(() => ({ exitCode: 1 }));

    expect(await findPythonExecutable(createContext(executor), 'win32')).toBe(
      path.join(dir, 'Microsoft', 'WindowsApps', 'python.exe')
    );
    expect(executor.calls.map(commandLine)).toEqual(['where python', 'where python3']);
  });
});
