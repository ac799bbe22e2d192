export const APP_NAME = 'munki-sweep';
export const DISPLAY_NAME = 'Munki Sweep';
export const DESCRIPTION = 'Usage reports and consistent removal for Munki repositories';
export const HOME_DIR = '.munki-sweep';
export const ENV_PREFIX = 'MUNKI_SWEEP';
export const CONFIG_FILE = 'config.yaml';

export function envVar(suffix: string): string {
  return `${ENV_PREFIX}_${suffix.toUpperCase()}`;
}
