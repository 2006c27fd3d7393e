import fs from 'fs';
import os from 'os';
import path from 'path';
import { describeError } from './errors.js';
import { type ThresholdLevel, isThresholdLevel, log } from './logging.js';
import { DEFAULT_NUMBER_PATTERN, compileNumberPattern } from './tokens.js';

const CONFIG_PATH = process.env.CONFIG_PATH || path.join(os.homedir(), '.config', 'folio-rename', 'config.json');

export interface Settings {
  logLevel?: ThresholdLevel;
  preserveConforming: boolean;
  numberPattern: string;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  preserveConforming: false,
  numberPattern: DEFAULT_NUMBER_PATTERN,
};

function readJson(file: string): unknown {
  if (!fs.existsSync(file)) return undefined;
  try {
    return JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    log('warn', `config: ignoring unreadable ${file}: ${describeError(e)}`);
    return undefined;
  }
}

export function loadSettings(configPath: string = CONFIG_PATH): Settings {
  const settings: Settings = { ...DEFAULT_SETTINGS };
  const raw = readJson(configPath);
  if (raw === undefined) return settings;
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    log('warn', `config: ${configPath} is not an object, using defaults`);
    return settings;
  }
  const record: Record<string, unknown> = { ...raw };

  if (record.logLevel !== undefined) {
    if (isThresholdLevel(record.logLevel)) settings.logLevel = record.logLevel;
    else log('warn', `config: unknown logLevel ${String(record.logLevel)}`);
  }
  if (record.preserveConforming !== undefined) {
    if (typeof record.preserveConforming === 'boolean') settings.preserveConforming = record.preserveConforming;
    else log('warn', 'config: preserveConforming must be a boolean');
  }
  if (record.numberPattern !== undefined) {
    const pattern = record.numberPattern;
    try {
      if (typeof pattern !== 'string') throw new Error('numberPattern must be a string');
      compileNumberPattern(pattern);
      settings.numberPattern = pattern;
    } catch (e) {
      log('warn', `config: keeping default numberPattern: ${describeError(e)}`);
    }
  }
  return settings;
}
