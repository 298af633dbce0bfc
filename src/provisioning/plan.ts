/**
 * Provisioning plan: the ordered host commands for an ambry install
 */

import type { ProvisionSettings } from '../config/types';

export type StepId =
  | 'update-package-index'
  | 'generate-locale'
  | 'install-os-packages'
  | 'upgrade-pip'
  | 'install-pysqlite'
  | 'install-ambry'
  | 'install-ambry-config';

export interface ProvisionStep {
  id: StepId;
  description: string;
  command: string;
  args: string[];
  /** A failing fatal step ends the run */
  fatal: boolean;
}

export type StepSettings = Pick<
  ProvisionSettings,
  | 'aptCommand'
  | 'pipCommand'
  | 'localeGenCommand'
  | 'ambryCommand'
  | 'locale'
  | 'ambryRepository'
  | 'ambryDevBranch'
  | 'pysqliteSource'
  | 'strict'
>;

export interface InstallPlanInput {
  packages: string[];
  isDev: boolean;
  settings: StepSettings;
}

/**
 * Any non-empty value turns on the editable install, whitespace included
 */
export function isDevMode(flag: string | undefined): boolean {
  return flag !== undefined && flag.length > 0;
}

/**
 * pip requirement for ambry: an editable checkout of the dev branch, or the default branch
 */
export function ambryInstallArgs(settings: StepSettings, isDev: boolean): string[] {
  if (isDev) {
    return ['install', '-e', `git+${settings.ambryRepository}@${settings.ambryDevBranch}#egg=ambry`];
  }
  return ['install', `git+${settings.ambryRepository}`];
}

export function buildPreparationSteps(settings: StepSettings): ProvisionStep[] {
  return [
    {
      id: 'update-package-index',
      description: 'Update OS package index',
      command: settings.aptCommand,
      args: ['update'],
      fatal: settings.strict,
    },
    {
      id: 'generate-locale',
      description: `Generate locale ${settings.locale}`,
      command: settings.localeGenCommand,
      args: [settings.locale],
      fatal: settings.strict,
    },
  ];
}

export function buildInstallSteps({ packages, isDev, settings }: InstallPlanInput): ProvisionStep[] {
  return [
    {
      id: 'install-os-packages',
      description: `Install ${packages.length} OS packages`,
      command: settings.aptCommand,
      args: ['install', '-y', ...packages],
      fatal: true,
    },
    {
      id: 'upgrade-pip',
      description: 'Upgrade pip',
      command: settings.pipCommand,
      args: ['install', '-U', 'pip'],
      fatal: settings.strict,
    },
    {
      id: 'install-pysqlite',
      description: 'Install spatialite-capable pysqlite driver',
      command: settings.pipCommand,
      args: ['install', settings.pysqliteSource],
      fatal: settings.strict,
    },
    {
      id: 'install-ambry',
      description: isDev
        ? `Install ambry in editable mode from ${settings.ambryDevBranch}`
        : 'Install ambry',
      command: settings.pipCommand,
      args: ambryInstallArgs(settings, isDev),
      fatal: settings.strict,
    },
    {
      id: 'install-ambry-config',
      description: 'Install default ambry configuration',
      command: settings.ambryCommand,
      args: ['config', 'install'],
      fatal: settings.strict,
    },
  ];
}

export function formatStep(step: ProvisionStep): string {
  return [step.command, ...step.args].join(' ');
}
