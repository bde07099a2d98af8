#!/usr/bin/env node
/**
 * Print the effective settings, optionally changing some first
 *
 * Usage: npm run settings -- [--set key=value ...] [--reset]
 */

import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config(); // Fallback to .env
import { ConfigManager, HarvestSettings, SETTING_FIELDS, defaultSettings, parseSettings, toPersisted } from '../lib/config';
import { logger } from '../utils/logger';

export class SettingsError extends Error {
  constructor(
    message: string,
    public readonly key: string
  ) {
    super(message);
    this.name = 'SettingsError';
  }
}

const KNOWN_KEYS = new Set(Object.values(SETTING_FIELDS).flatMap((field) => field.keys));

/**
 * `key=value` → [key, value]. Values are read as JSON when they parse, else as text.
 */
export function parseAssignment(assignment: string): [string, unknown] {
  const eq = assignment.indexOf('=');
  if (eq <= 0) {
    throw new SettingsError(`Expected key=value, got '${assignment}'`, assignment);
  }
  const key = assignment.slice(0, eq).trim();
  const rawValue = assignment.slice(eq + 1).trim();
  try {
    const value: unknown = JSON.parse(rawValue);
    return [key, value];
  } catch {
    return [key, rawValue];
  }
}

/**
 * Apply assignments on top of `current`. Unknown keys and invalid values throw.
 */
export function applyAssignments(current: HarvestSettings, assignments: string[]): Readonly<HarvestSettings> {
  const raw = toPersisted(current);
  for (const assignment of assignments) {
    const [key, value] = parseAssignment(assignment);
    if (!KNOWN_KEYS.has(key)) {
      throw new SettingsError(`Unknown setting '${key}'`, key);
    }
    // drop every spelling of the field so the new value wins
    for (const field of Object.values(SETTING_FIELDS)) {
      if (field.keys.includes(key)) {
        for (const alias of field.keys) delete raw[alias];
      }
    }
    raw[key] = value;
  }

  const { settings, warnings } = parseSettings(raw);
  if (warnings.length > 0) {
    const key = warnings[0].split(':')[0];
    throw new SettingsError(`Invalid setting ${warnings[0]}`, key);
  }
  return settings;
}

async function main(assignments: string[] = [], reset = false): Promise<void> {
  try {
    const settingsPath = ConfigManager.defaultSettingsPath();
    let settings = reset ? defaultSettings() : await ConfigManager.loadSettings(settingsPath);

    if (assignments.length > 0) {
      settings = applyAssignments(settings, assignments);
    }
    if (reset || assignments.length > 0) {
      await ConfigManager.saveSettings(settings, settingsPath);
      console.log(`[SETTINGS] ✓ Saved ${settingsPath}`);
    }

    console.log(JSON.stringify(toPersisted(settings), null, 2));
  } catch (error: unknown) {
    console.error('[SETTINGS] ✗ Error:', error instanceof Error ? error.message : String(error));
    logger.debug('settings failed', error);
    process.exit(1);
  }
}

// Run if called directly
if (require.main === module) {
  const args = process.argv.slice(2);
  const assignments: string[] = [];
  args.forEach((arg, index) => {
    if (arg === '--set' && args[index + 1]) {
      assignments.push(args[index + 1]);
    }
  });
  void main(assignments, args.includes('--reset'));
}

export default main;
