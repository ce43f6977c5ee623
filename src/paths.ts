/**
 * XDG Base Directory paths for chatrelay.
 *
 * - Config: ~/.config/chatrelay/ (or $XDG_CONFIG_HOME/chatrelay/)
 * - Data: ~/.local/share/chatrelay/ (or $XDG_DATA_HOME/chatrelay/), holds the SQLite store
 * - Project: .chatrelay/ in the working directory
 */

import { homedir } from 'os';
import { join } from 'path';

const APP_DIR = 'chatrelay';

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.config', APP_DIR);
}

export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_DATA_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.local', 'share', APP_DIR);
}

/**
 * Project-specific directory, always `.chatrelay/` under the working directory.
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, `.${APP_DIR}`);
}

export function getUserConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigDir(env), 'config.json');
}

export function getProjectConfigPath(cwd: string = process.cwd()): string {
  return join(getProjectDir(cwd), 'config.json');
}

export function getDefaultDatabasePath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getDataDir(env), 'chatrelay.db');
}
