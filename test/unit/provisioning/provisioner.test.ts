import { describe, it, expect, beforeEach } from '@jest/globals';
import { abortExitCode, provision, type ProvisionOptions } from '../../../src/provisioning/provisioner';
import { loadPackageCatalog, type PackageCatalog } from '../../../src/provisioning/packages';
import { createDefaultSettings } from '../../../src/config/config';
import type { ProvisionSettings } from '../../../src/config/types';
import { CommandError, ErrorCodes } from '../../../src/lib/errors';
import { FakeCommandRunner, createSilentLogger } from '../../__support__/fakes';

const AFTER_OS_PACKAGES = [
  'pip install -U pip',
  'pip install git+https://github.com/clarinova/pysqlite.git#egg=pysqlite',
  'pip install git+https://github.com/CivicKnowledge/ambry.git',
  'ambry config install',
];

function overflowError(command: string): CommandError {
  return new CommandError(
    'Command output exceeded maximum buffer size of 4 bytes',
    command,
    -1,
    ErrorCodes.OUTPUT_LIMIT_EXCEEDED,
  );
}

describe('provision', () => {
  let catalog: PackageCatalog;
  let settings: ProvisionSettings;
  let runner: FakeCommandRunner;

  function options(overrides: Partial<ProvisionOptions> = {}): ProvisionOptions {
    return {
      runner,
      logger: createSilentLogger(),
      settings,
      catalog,
      isDev: false,
      ...overrides,
    };
  }

  beforeEach(() => {
    catalog = loadPackageCatalog();
    settings = createDefaultSettings();
    runner = new FakeCommandRunner('16.04');
  });

  it('runs every step in order when the OS package install succeeds', async () => {
    const outcome = await provision(options());
    const lines = runner.commandLines();

    expect(lines.slice(0, 3)).toEqual(['apt-get update', 'locale-gen en_US.UTF-8', 'lsb_release -r -s']);
    expect(lines[3]).toMatch(/^apt-get install -y git gcc g\+\+ /);
    expect(lines.slice(4)).toEqual(AFTER_OS_PACKAGES);
    expect(outcome.exitCode).toBe(0);
    expect(outcome.aborted).toBe(false);
    expect(outcome.release).toEqual({ raw: '16.04', numeric: 1604 });
    expect(outcome.steps.map((step) => step.ok)).toEqual([true, true, true, true, true, true, true]);
  });

  it('installs the release-specific spatialite packages', async () => {
    runner = new FakeCommandRunner('14.04');

    const outcome = await provision(options());

    expect(outcome.packages).toContain('libspatialite5');
    expect(runner.commandLines()[3]).toContain(' libspatialite5 ');
  });

  it('stops after a failed OS package install and propagates its status', async () => {
    runner.respond('apt-get install', { exitCode: 100, stderr: 'E: Unable to locate package' });

    const outcome = await provision(options());

    expect(runner.commandLines()).toHaveLength(4);
    expect(runner.commandLines().some((line) => line.startsWith('pip'))).toBe(false);
    expect(outcome.exitCode).toBe(100);
    expect(outcome.aborted).toBe(true);
    expect(outcome.failedStep).toBe('install-os-packages');
    expect(outcome.error).toMatch(/^Failed to install OS packages: git gcc/);
    expect(outcome.steps.slice(2).map((step) => [step.id, step.skipped])).toEqual([
      ['install-os-packages', false],
      ['upgrade-pip', true],
      ['install-pysqlite', true],
      ['install-ambry', true],
      ['install-ambry-config', true],
    ]);
  });

  it('exits 0 after a failed OS package install in legacy mode', async () => {
    settings = { ...settings, legacyExitStatus: true };
    runner.respond('apt-get install', { exitCode: 100 });

    const outcome = await provision(options());

    expect(outcome.exitCode).toBe(0);
    expect(outcome.aborted).toBe(true);
    expect(runner.commandLines()).toHaveLength(4);
  });

  it('continues past unchecked failures', async () => {
    runner
      .respond('locale-gen', { exitCode: 1 })
      .respond('pip install -U pip', { exitCode: 2 })
      .respond('ambry config install', { exitCode: 127 });

    const outcome = await provision(options());

    expect(runner.commandLines().slice(4)).toEqual(AFTER_OS_PACKAGES);
    expect(outcome.exitCode).toBe(0);
    expect(outcome.steps.filter((step) => !step.ok).map((step) => step.id)).toEqual([
      'generate-locale',
      'upgrade-pip',
      'install-ambry-config',
    ]);
  });

  it('treats a command that overflows its output buffer as a failed, non-fatal step', async () => {
    runner.fail('pip install -U pip', overflowError('pip'));

    const outcome = await provision(options());

    expect(runner.commandLines().slice(4)).toEqual(AFTER_OS_PACKAGES);
    expect(outcome.exitCode).toBe(0);
    expect(outcome.steps.find((step) => step.id === 'upgrade-pip')).toMatchObject({
      ok: false,
      skipped: false,
      exitCode: -1,
      stderr: 'Command output exceeded maximum buffer size of 4 bytes',
    });
  });

  it('applies the exit policy when the OS package install overflows its output buffer', async () => {
    const overflow = overflowError('apt-get');
    runner.fail('apt-get install', overflow);

    const outcome = await provision(options());

    expect(outcome.exitCode).toBe(1);
    expect(outcome.failedStep).toBe('install-os-packages');
    expect(runner.commandLines()).toHaveLength(4);

    settings = { ...settings, legacyExitStatus: true };
    runner = new FakeCommandRunner('16.04').fail('apt-get install', overflow);

    await expect(provision(options())).resolves.toMatchObject({ exitCode: 0, aborted: true });
  });

  it('still rejects on errors that are not command failures', async () => {
    runner.fail('pip install -U pip', new TypeError('runner misconfigured'));

    await expect(provision(options())).rejects.toThrow('runner misconfigured');
  });

  it('stops at the first failure of any step in strict mode', async () => {
    settings = { ...settings, strict: true };
    runner.respond('pip install git+https://github.com/clarinova', { exitCode: 1 });

    const outcome = await provision(options());

    expect(runner.commandLines().slice(4)).toEqual(AFTER_OS_PACKAGES.slice(0, 2));
    expect(outcome.exitCode).toBe(1);
    expect(outcome.failedStep).toBe('install-pysqlite');
  });

  it('stops before release detection when a strict preparation step fails', async () => {
    settings = { ...settings, strict: true };
    runner.respond('apt-get update', { exitCode: 100 });

    const outcome = await provision(options());

    expect(runner.commandLines()).toEqual(['apt-get update']);
    expect(outcome.exitCode).toBe(100);
    expect(outcome.failedStep).toBe('update-package-index');
  });

  it('routes a development install to the editable dev branch', async () => {
    await provision(options({ isDev: true }));

    expect(runner.commandLines()).toContain(
      'pip install -e git+https://github.com/CivicKnowledge/ambry.git@develop#egg=ambry',
    );
  });

  it('uses a release override instead of lsb_release', async () => {
    const outcome = await provision(options({ release: '14.04' }));

    expect(runner.commandLines()).not.toContain('lsb_release -r -s');
    expect(outcome.packages).toContain('libspatialite5');
  });

  it('fails with status 1 when the release cannot be determined', async () => {
    runner = new FakeCommandRunner('unknown');

    const outcome = await provision(options());

    expect(outcome.exitCode).toBe(1);
    expect(outcome.error).toBe("Unrecognized OS release: 'unknown'");
    expect(runner.commandLines()).toEqual([
      'apt-get update',
      'locale-gen en_US.UTF-8',
      'lsb_release -r -s',
    ]);
  });

  it('runs nothing but release detection in a dry run', async () => {
    const outcome = await provision(options({ dryRun: true }));

    expect(runner.commandLines()).toEqual(['lsb_release -r -s']);
    expect(outcome.exitCode).toBe(0);
    expect(outcome.steps).toHaveLength(7);
    expect(outcome.steps.every((step) => step.skipped && step.exitCode === null)).toBe(true);
    expect(outcome.steps[6]?.command).toBe('ambry config install');
  });

  it('passes the command timeout to the runner', async () => {
    settings = { ...settings, commandTimeoutMs: 600000 };

    await provision(options({ passthrough: true }));

    expect(runner.calls[0]?.options).toEqual({ timeout: 600000, passthrough: true });
  });
});

describe('abortExitCode', () => {
  it('keeps the failing status', () => {
    expect(abortExitCode(100, false)).toBe(100);
  });

  it('maps signal and timeout statuses to 1', () => {
    expect(abortExitCode(-1, false)).toBe(1);
  });

  it('reports 0 in legacy mode', () => {
    expect(abortExitCode(100, true)).toBe(0);
  });
});
