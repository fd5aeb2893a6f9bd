import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

const APP_DIR_NAME = 'programme-advisor';

function resolveHomeDir(): string {
  const homeFromEnv = process.env.HOME;
  if (typeof homeFromEnv === 'string' && homeFromEnv.trim()) {
    return homeFromEnv;
  }
  return os.homedir();
}

export function getConfigDir(): string {
  const override = process.env.ADVISOR_CONFIG_DIR;
  if (typeof override === 'string' && override.trim()) {
    if (!fs.existsSync(override)) {
      fs.mkdirSync(override, { recursive: true, mode: 0o700 });
    }
    return override;
  }

  const xdgConfigHome = process.env.XDG_CONFIG_HOME;
  const baseDir =
    typeof xdgConfigHome === 'string' && xdgConfigHome.trim()
      ? xdgConfigHome
      : path.join(resolveHomeDir(), '.config');

  return path.join(baseDir, APP_DIR_NAME);
}

/**
 * Data files shipped with the package. Sources and build output both sit
 * three levels below the package root (src/infra/config, dist/infra/config).
 */
export function getBundledDataDir(): string {
  return path.resolve(__dirname, '..', '..', '..', 'data');
}
