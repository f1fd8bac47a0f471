import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { resolveDataFilePath, getConfigDir, getDefaultPathInputs } from '../../src/storage/data-path.js';

const all = {
  override: '/explicit/tasks.json',
  envOverride: '/env/tasks.json',
  configDir: '/home/sam/.config',
  homeDir: '/home/sam',
};

describe('resolveDataFilePath', () => {
  it('prefers the explicit override', () => {
    expect(resolveDataFilePath(all)).toBe('/explicit/tasks.json');
  });

  it('falls back to the environment override', () => {
    expect(resolveDataFilePath({ ...all, override: null })).toBe('/env/tasks.json');
  });

  it('falls back to the config directory', () => {
    expect(resolveDataFilePath({ ...all, override: null, envOverride: null }))
      .toBe(join('/home/sam/.config', 'todo', 'tasks.json'));
  });

  it('falls back to a dotfile in the home directory', () => {
    expect(resolveDataFilePath({ homeDir: '/home/sam' })).toBe(join('/home/sam', '.todo.json'));
  });

  it('falls back to the current directory', () => {
    expect(resolveDataFilePath({})).toBe('tasks.json');
  });

  it('treats empty strings as absent', () => {
    expect(resolveDataFilePath({ override: '', envOverride: '', configDir: '', homeDir: '/h' }))
      .toBe(join('/h', '.todo.json'));
  });
});

describe('getConfigDir', () => {
  it('uses XDG_CONFIG_HOME on linux', () => {
    expect(getConfigDir({ XDG_CONFIG_HOME: '/xdg' }, 'linux', '/home/sam')).toBe('/xdg');
  });

  it('defaults to ~/.config on linux', () => {
    expect(getConfigDir({}, 'linux', '/home/sam')).toBe(join('/home/sam', '.config'));
  });

  it('uses Application Support on macOS', () => {
    expect(getConfigDir({}, 'darwin', '/Users/sam')).toBe(join('/Users/sam', 'Library', 'Application Support'));
  });

  it('uses APPDATA on Windows', () => {
    expect(getConfigDir({ APPDATA: 'C:\\Users\\sam\\AppData\\Roaming' }, 'win32', 'C:\\Users\\sam'))
      .toBe('C:\\Users\\sam\\AppData\\Roaming');
  });

  it('returns null without a home directory or env hint', () => {
    expect(getConfigDir({}, 'linux', '')).toBeNull();
  });
});

describe('getDefaultPathInputs', () => {
  it('reads TODO_DATA_FILE and the override', () => {
    const inputs = getDefaultPathInputs('/cli.json', { TODO_DATA_FILE: '/env.json' }, 'linux', '/home/sam');
    expect(inputs).toEqual({
      override: '/cli.json',
      envOverride: '/env.json',
      configDir: join('/home/sam', '.config'),
      homeDir: '/home/sam',
    });
    expect(resolveDataFilePath(inputs)).toBe('/cli.json');
  });
});
