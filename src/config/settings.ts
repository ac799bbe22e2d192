import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import yaml from 'js-yaml';
import { CONFIG_FILE, HOME_DIR, envVar } from './branding.js';
import { SettingsSchema, type Settings } from './schema.js';

let configPath = '';
let configData: Record<string, unknown> = {};

export function defaultConfigPath(): string {
  const home = process.env[envVar('HOME')] ?? join(homedir(), HOME_DIR);
  return join(home, CONFIG_FILE);
}

export function init(path: string = defaultConfigPath()): void {
  configPath = path;
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    // No settings file yet
    configData = {};
    return;
  }
  const data: unknown = yaml.load(raw);
  configData = isRecord(data) ? data : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function get(key: string): string {
  const value = configData[key];
  return value != null ? String(value) : '';
}

export function set(key: string, value: string): void {
  if (!configPath) {
    throw new Error('Settings not initialised.');
  }
  configData[key] = value;
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, yaml.dump(configData), 'utf-8');
}

export function all(): Record<string, unknown> {
  return { ...configData };
}

/**
 * Typed view of the loaded settings, with defaults applied.
 * Throws a ZodError when a value has the wrong shape.
 */
export function resolved(): Settings {
  return SettingsSchema.parse(configData);
}
