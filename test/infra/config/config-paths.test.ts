import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getBundledDataDir, getConfigDir } from '../../../src/infra/config/config-paths.js';

function makeTempHome(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'advisor-config-paths-'));
}

describe('config-paths', () => {
  const originalEnv = {
    HOME: process.env.HOME,
    XDG_CONFIG_HOME: process.env.XDG_CONFIG_HOME,
    ADVISOR_CONFIG_DIR: process.env.ADVISOR_CONFIG_DIR,
  };

  function restore(key: keyof typeof originalEnv): void {
    const value = originalEnv[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  afterEach(() => {
    restore('HOME');
    restore('XDG_CONFIG_HOME');
    restore('ADVISOR_CONFIG_DIR');
  });

  test('respects explicit config dir override and creates it', () => {
    const overrideDir = path.join(makeTempHome(), 'custom-config');
    process.env.ADVISOR_CONFIG_DIR = overrideDir;

    expect(getConfigDir()).toBe(overrideDir);
    expect(fs.existsSync(overrideDir)).toBe(true);
  });

  test('uses XDG_CONFIG_HOME when no override is set', () => {
    const xdgHome = makeTempHome();
    delete process.env.ADVISOR_CONFIG_DIR;
    process.env.XDG_CONFIG_HOME = xdgHome;

    expect(getConfigDir()).toBe(path.join(xdgHome, 'programme-advisor'));
  });

  test('falls back to ~/.config', () => {
    const tempHome = makeTempHome();
    delete process.env.ADVISOR_CONFIG_DIR;
    delete process.env.XDG_CONFIG_HOME;
    process.env.HOME = tempHome;

    expect(getConfigDir()).toBe(path.join(tempHome, '.config', 'programme-advisor'));
  });

  test('points at the bundled data files', () => {
    const dataDir = getBundledDataDir();

    expect(path.basename(dataDir)).toBe('data');
    expect(fs.existsSync(path.join(dataDir, 'programmes.csv'))).toBe(true);
    expect(fs.existsSync(path.join(dataDir, 'questionnaire.json'))).toBe(true);
  });
});
