import { promises as fs } from 'node:fs';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { parseArguments } from '../../../src/cli/parser.js';
import { resolveInvocationConfig } from '../../../src/core/resolve-config.js';
import { runBuildActions } from '../../../src/orchestration/sequencer.js';
import { formatCommandLine } from '../../../src/process/command-line.js';
import type { InvocationConfig } from '../../../src/types/invocation.js';
import { FakeProcessRunner } from '../../helpers/fake-runner.js';
import {
  TEST_SWIFT,
  TEST_TOOLCHAIN,
  createDeps,
  createMemoryReporter,
  createTestWorkspace,
  type TestWorkspace
} from '../../helpers/test-env.js';

describe('action sequencer', () => {
  let ws: TestWorkspace;

  beforeEach(async () => {
    ws = await createTestWorkspace();
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  function configFor(argv: string[], packagePath = 'swift-docc'): InvocationConfig {
    const parsed = parseArguments(['--toolchain', TEST_TOOLCHAIN, '--package-path', packagePath, ...argv]);
    if (parsed.kind !== 'run') {
      throw new Error('expected a run command');
    }
    return resolveInvocationConfig(parsed.options, { helperRoot: ws.rootDir, cwd: ws.rootDir });
  }

  function packageArgs(): string[] {
    return [
      '--package-path',
      ws.packagePath,
      '--scratch-path',
      path.join(ws.packagePath, '.build'),
      '--configuration',
      'debug'
    ];
  }

  const linuxRpath = ['-Xlinker', '-rpath', '-Xlinker', '$ORIGIN/../lib/swift/linux'];

  it('builds the product by default', async () => {
    const runner = new FakeProcessRunner();
    const reporter = createMemoryReporter();

    const outcome = await runBuildActions(configFor([]), createDeps(runner, reporter));

    expect(outcome).toEqual({ ok: true, completed: ['build'] });
    expect(runner.commands).toEqual([
      [TEST_SWIFT, '-print-target-info'],
      [TEST_SWIFT, 'build', ...packageArgs(), ...linuxRpath, '--enable-test-discovery', '--product', 'docc']
    ]);
    expect(reporter.stdout).toEqual(['** Building swift-docc **']);
    expect(reporter.stderr).toEqual([]);
  });

  it('runs every stage in fixed order and queries the target once', async () => {
    const runner = new FakeProcessRunner();
    const reporter = createMemoryReporter();
    const config = configFor(['--update', '--install-dir', path.join(ws.rootDir, 'out', 'bin', 'docc'), 'all']);

    const outcome = await runBuildActions(config, createDeps(runner, reporter));

    expect(outcome).toEqual({
      ok: true,
      completed: ['update', 'build', 'generate-xcodeproj', 'test', 'install']
    });
    expect(reporter.stdout.filter((line) => line.startsWith('** '))).toEqual([
      '** Updating dependencies of swift-docc **',
      '** Building swift-docc **',
      '** Generating Xcode project for swift-docc **',
      '** Testing swift-docc **',
      '** Installing swift-docc **'
    ]);

    const [update, targetInfo, build, generate, test, installBuild] = runner.commands;
    expect(update).toEqual([
      TEST_SWIFT,
      'package',
      '--package-path',
      ws.packagePath,
      '--scratch-path',
      path.join(ws.packagePath, '.build'),
      'update'
    ]);
    expect(targetInfo).toEqual([TEST_SWIFT, '-print-target-info']);
    expect(build?.slice(0, 2)).toEqual([TEST_SWIFT, 'build']);
    expect(generate).toEqual([
      TEST_SWIFT,
      'package',
      '--package-path',
      ws.packagePath,
      'generate-xcodeproj',
      '--output',
      path.join(ws.packagePath, 'swift-docc.xcodeproj')
    ]);
    expect(test).toEqual([
      TEST_SWIFT,
      'test',
      ...packageArgs(),
      ...linuxRpath,
      '--parallel',
      '--enable-test-discovery',
      '--test-product',
      'SwiftDocCPackageTests'
    ]);
    expect(installBuild).toEqual([
      TEST_SWIFT,
      'build',
      ...packageArgs(),
      '--verbose',
      ...linuxRpath,
      '--disable-local-rpath',
      '-Xswiftc',
      '-no-toolchain-stdlib-rpath',
      '--enable-test-discovery',
      '--product',
      'docc'
    ]);
    expect(runner.commands.filter((command) => command[1] === '-print-target-info')).toHaveLength(1);
  });

  it('stops at the first failing stage and reports the command', async () => {
    const runner = new FakeProcessRunner({
      exitCodeFor: (command) => (command[1] === 'build' ? 1 : undefined)
    });
    const reporter = createMemoryReporter();

    const outcome = await runBuildActions(configFor(['--update', 'build', 'test']), createDeps(runner, reporter));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.completed).toEqual(['update']);
      expect(outcome.failure).toMatchObject({ stage: 'build', kind: 'command', exitCode: 1 });
      const command = outcome.failure.kind === 'command' ? outcome.failure.command : [];
      expect(reporter.stderr).toEqual(['FAIL: Building swift-docc failed', `Executing: ${formatCommandLine(command)}`]);
    }
    expect(runner.commands.some((command) => command[1] === 'test')).toBe(false);
  });

  it('fails the stage when the target query fails', async () => {
    const runner = new FakeProcessRunner({
      exitCodeFor: (command) => (command[1] === '-print-target-info' ? 1 : undefined)
    });
    const reporter = createMemoryReporter();

    const outcome = await runBuildActions(configFor(['test']), createDeps(runner, reporter));

    expect(outcome.ok).toBe(false);
    expect(reporter.stderr).toEqual([
      'FAIL: Testing swift-docc failed',
      `Executing: ${TEST_SWIFT} -print-target-info`,
      '  failed'
    ]);
  });

  it('fails the stage when the target info cannot be parsed', async () => {
    const runner = new FakeProcessRunner({ triple: 'wasm32' });
    const reporter = createMemoryReporter();

    const outcome = await runBuildActions(configFor(['test']), createDeps(runner, reporter));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.completed).toEqual([]);
      expect(outcome.failure).toMatchObject({ stage: 'test', kind: 'error' });
    }
    expect(reporter.stderr).toEqual([
      'FAIL: Testing swift-docc failed',
      "error: Unrecognized target triple: 'wasm32'",
      '  triple: wasm32'
    ]);
    expect(runner.commands).toEqual([[TEST_SWIFT, '-print-target-info']]);
  });

  it('follows a symlinked package to its real directory', async () => {
    await fs.symlink(ws.packagePath, path.join(ws.rootDir, 'link'));
    const runner = new FakeProcessRunner();
    const reporter = createMemoryReporter();
    const config = configFor(['generate-xcodeproj'], 'link');

    const outcome = await runBuildActions(config, createDeps(runner, reporter));

    expect(config.packagePath).toBe(ws.packagePath);
    expect(config.packageName).toBe('swift-docc');
    expect(outcome).toEqual({ ok: true, completed: ['generate-xcodeproj'] });
    expect(reporter.stdout).toEqual(['** Generating Xcode project for swift-docc **']);
    expect(runner.commands).toEqual([
      [
        TEST_SWIFT,
        'package',
        '--package-path',
        ws.packagePath,
        'generate-xcodeproj',
        '--output',
        path.join(ws.packagePath, 'swift-docc.xcodeproj')
      ]
    ]);
  });

  it('names the generate stage in its failure message', async () => {
    const runner = new FakeProcessRunner({ exitCodeFor: () => 3 });
    const reporter = createMemoryReporter();

    const outcome = await runBuildActions(configFor(['generate-xcodeproj']), createDeps(runner, reporter));

    expect(outcome.ok).toBe(false);
    expect(reporter.stderr[0]).toBe('FAIL: Generating the Xcode project failed');
  });

  it('warns about an unsupported cross-compile pair and keeps building', async () => {
    const runner = new FakeProcessRunner();
    const reporter = createMemoryReporter();

    const outcome = await runBuildActions(
      configFor(['--cross-compile-hosts', 'macosx-arm64']),
      createDeps(runner, reporter)
    );

    expect(outcome).toEqual({ ok: true, completed: ['build'] });
    expect(reporter.stderr).toEqual(['cannot cross-compile for macosx-arm64']);
    expect(runner.commands[1]).not.toContain('--arch');
  });

  it('builds universal binaries for macOS hosts on macOS', async () => {
    const runner = new FakeProcessRunner({ triple: 'arm64-apple-macosx14.0', unversionedTriple: 'arm64-apple-macosx' });
    const reporter = createMemoryReporter();

    await runBuildActions(configFor(['--cross-compile-hosts', 'macosx-arm64']), createDeps(runner, reporter, 'darwin'));

    expect(runner.commands[1]).toEqual([
      TEST_SWIFT,
      'build',
      ...packageArgs(),
      '-Xlinker',
      '-rpath',
      '-Xlinker',
      '@executable_path/../lib/swift/macosx',
      '--arch',
      'x86_64',
      '--arch',
      'arm64',
      '--product',
      'docc'
    ]);
    expect(reporter.stderr).toEqual([]);
  });

  it('echoes commands in verbose mode', async () => {
    const runner = new FakeProcessRunner();
    const reporter = createMemoryReporter();

    await runBuildActions(configFor(['-v']), createDeps(runner, reporter));

    expect(reporter.stdout).toEqual([
      '** Building swift-docc **',
      formatCommandLine([
        TEST_SWIFT,
        'build',
        ...packageArgs(),
        '--verbose',
        ...linuxRpath,
        '--enable-test-discovery',
        '--product',
        'docc'
      ])
    ]);
  });

  it('overlays the child environment per invocation', async () => {
    const runner = new FakeProcessRunner();
    const reporter = createMemoryReporter();

    await runBuildActions(configFor(['--update', 'build']), createDeps(runner, reporter));

    const [update, targetInfo, build] = runner.calls;
    expect(update?.env).toEqual({ PATH: '/usr/bin', HOME: '/home/tester', SWIFTCI_USE_LOCAL_DEPS: '1' });
    expect(targetInfo?.env).toEqual({ PATH: '/usr/bin', HOME: '/home/tester' });
    expect(build?.env).toEqual({
      PATH: '/usr/bin',
      HOME: '/home/tester',
      SWIFTCI_USE_LOCAL_DEPS: '1',
      SWIFT_BUILD_SCRIPT_ENVIRONMENT: '1'
    });
  });

  it('leaves out the local dependency flag with --no-local-deps', async () => {
    const runner = new FakeProcessRunner();
    const reporter = createMemoryReporter();

    await runBuildActions(configFor(['--no-local-deps']), createDeps(runner, reporter));

    expect(runner.calls[1]?.env).toEqual({
      PATH: '/usr/bin',
      HOME: '/home/tester',
      SWIFT_BUILD_SCRIPT_ENVIRONMENT: '1'
    });
  });
});
