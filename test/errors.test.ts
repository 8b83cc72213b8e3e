/**
 * Build Failure Tests
 */

import { describe, it, expect } from 'vitest';
import {
  BuildErrorKind,
  fail,
  fileFailure,
  formatCommand,
  formatFailure,
  ok,
  toolFailure,
} from '../src/deployment/errors';

describe('formatCommand', () => {
  it('joins program and arguments with spaces', (): void => {
    expect(formatCommand('dotnet', ['publish', 'App.csproj', '-c', 'Release'])).toBe(
      'dotnet publish App.csproj -c Release'
    );
  });

  it('quotes parts that contain whitespace', (): void => {
    expect(formatCommand('dotnet', ['restore', 'My App.csproj'])).toBe('dotnet restore "My App.csproj"');
  });
});

describe('toolFailure', () => {
  it('keeps stderr verbatim as the output', (): void => {
    const result = toolFailure('publish', 'dotnet', ['publish'], {
      success: false,
      exitCode: 1,
      stdout: 'Determining projects to restore...\n',
      stderr: 'error CS1002: ; expected\n',
    });

    expect(result.error).toEqual({
      kind: BuildErrorKind.TOOL_INVOCATION_FAILED,
      step: 'publish',
      message: "'dotnet publish' failed with exit code 1",
      command: 'dotnet publish',
      output: 'error CS1002: ; expected\n',
      mitigation: [],
    });
  });

  it('falls back to stdout when stderr is blank', (): void => {
    const result = toolFailure('restore', 'npm', ['ci'], {
      success: false,
      exitCode: 1,
      stdout: 'npm ERR! missing lock file',
      stderr: '  \n',
    });

    expect(result.error.output).toBe('npm ERR! missing lock file');
  });
});

describe('fileFailure', () => {
  it('names the step and the filesystem error', (): void => {
    const result = fileFailure('package', new Error("EACCES: permission denied, open '/srv/app.zip'"));

    expect(result.error.kind).toBe(BuildErrorKind.FILE_OPERATION_FAILED);
    expect(result.error.step).toBe('package');
    expect(result.error.message).toBe(
      "File operation failed during package: EACCES: permission denied, open '/srv/app.zip'"
    );
  });
});

describe('ok / fail', () => {
  it('wrap values and failures in a discriminated result', (): void => {
    expect(ok('out')).toEqual({ success: true, value: 'out' });

    const failed = fail(BuildErrorKind.PROJECT_NOT_FOUND, 'resolve', 'No project');
    expect(failed.success).toBe(false);
    expect(failed.error.mitigation).toEqual([]);
    expect(failed.error.command).toBeUndefined();
  });
});

describe('formatFailure', () => {
  it('renders message, step and error code', (): void => {
    const failure = fail(BuildErrorKind.PLATFORM_UNDETECTED, 'detect', 'Could not detect platform').error;

    expect(formatFailure(failure)).toBe(
      ['ERROR: Could not detect platform', '', '  Step: detect', '', 'Error code: PLATFORM_UNDETECTED'].join('\n')
    );
  });

  it('renders command, indented output and numbered mitigation steps', (): void => {
    const failure = toolFailure(
      'restore',
      'dotnet',
      ['restore', 'App.csproj'],
      { success: false, exitCode: 1, stdout: '', stderr: 'NU1101: line one\r\nline two\n' },
      ['Check the package source', 'Run the restore again']
    ).error;

    expect(formatFailure(failure)).toBe(
      [
        "ERROR: 'dotnet restore App.csproj' failed with exit code 1",
        '',
        '  Step: restore',
        '  Command: dotnet restore App.csproj',
        '  Output:',
        '    NU1101: line one',
        '    line two',
        '',
        'To resolve this issue:',
        '  1. Check the package source',
        '  2. Run the restore again',
        '',
        'Error code: TOOL_INVOCATION_FAILED',
      ].join('\n')
    );
  });

  it('omits the output block when output is blank', (): void => {
    const failure = fail(BuildErrorKind.TOOL_INVOCATION_FAILED, 'compile', 'failed', {
      command: 'npm run build',
      output: '\n',
    }).error;

    expect(formatFailure(failure)).not.toContain('Output:');
  });
});
