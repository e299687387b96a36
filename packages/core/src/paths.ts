import { join } from 'node:path';
import { homedir } from 'node:os';

const APP_DIR = 'tasklog';
const STORE_FILE = 'tasks.csv';

/** Platform-appropriate per-user configuration directory for the app */
export function getConfigDir(): string {
  const platform = process.platform;

  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', APP_DIR);
  }
  if (platform === 'win32') {
    return join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR);
  }
  // Linux / other
  return join(process.env['XDG_CONFIG_HOME'] ?? join(homedir(), '.config'), APP_DIR);
}

/** Returns the default location of the task file */
export function getDefaultStorePath(): string {
  return join(getConfigDir(), STORE_FILE);
}
