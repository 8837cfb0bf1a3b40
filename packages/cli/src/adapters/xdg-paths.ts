import { join } from 'node:path';
import { homedir } from 'node:os';

const APP_DIR = 'seti-analyzer';

export function getConfigDir(): string {
  return process.env.XDG_CONFIG_HOME
    ? join(process.env.XDG_CONFIG_HOME, APP_DIR)
    : join(homedir(), '.config', APP_DIR);
}

export function getDataDir(): string {
  return process.env.XDG_DATA_HOME
    ? join(process.env.XDG_DATA_HOME, APP_DIR)
    : join(homedir(), '.local', 'share', APP_DIR);
}
