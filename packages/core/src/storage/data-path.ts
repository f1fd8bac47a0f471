/**
 * Where the task file lives.
 * Precedence: --data-file > TODO_DATA_FILE > <config dir>/todo/tasks.json
 * > ~/.todo.json > ./tasks.json
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const DATA_FILE_ENV = 'TODO_DATA_FILE';

export interface DataPathInputs {
  override?: string | null;
  envOverride?: string | null;
  configDir?: string | null;
  homeDir?: string | null;
}

function present(value: string | null | undefined): value is string {
  return value != null && value !== '';
}

/** Pure: picks the data file path from already-gathered inputs */
export function resolveDataFilePath(inputs: DataPathInputs): string {
  if (present(inputs.override)) return inputs.override;
  if (present(inputs.envOverride)) return inputs.envOverride;
  if (present(inputs.configDir)) return join(inputs.configDir, 'todo', 'tasks.json');
  if (present(inputs.homeDir)) return join(inputs.homeDir, '.todo.json');
  return 'tasks.json';
}

/** Returns the platform-appropriate configuration directory */
export function getConfigDir(
  env: NodeJS.ProcessEnv,
  platform: NodeJS.Platform,
  home: string,
): string | null {
  if (platform === 'darwin') {
    return home ? join(home, 'Library', 'Application Support') : null;
  }
  if (platform === 'win32') {
    const appData = env['APPDATA'];
    if (present(appData)) return appData;
    return home ? join(home, 'AppData', 'Roaming') : null;
  }
  // Linux / other
  const xdg = env['XDG_CONFIG_HOME'];
  if (present(xdg)) return xdg;
  return home ? join(home, '.config') : null;
}

/** Gather path inputs from the running process */
export function getDefaultPathInputs(
  override?: string | null,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir(),
): DataPathInputs {
  return {
    override: override ?? null,
    envOverride: env[DATA_FILE_ENV] ?? null,
    configDir: getConfigDir(env, platform, home),
    homeDir: home || null,
  };
}
