/**
 * Load mode tables from YAML
 *
 * ```yaml
 * modes:
 *   Base:
 *     wiring:
 *       Dispenser: [Scoreboard]
 *   Fast:
 *     base: Base
 *     attributes:
 *       Dispenser: { Speed: 9 }
 * ```
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { Errors } from '../errors';
import type { ModeManager } from './mode-manager';
import { normalizeWiringConfig } from './normalize';
import type { WiringConfig } from './types';

export function parseModesYaml(text: string): Map<string, WiringConfig> {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    throw Errors.invalidDefinition(
      `Invalid modes YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (typeof document !== 'object' || document === null || !('modes' in document)) {
    throw Errors.invalidDefinition('Modes YAML must have a top-level "modes" map');
  }
  const { modes } = document;
  if (typeof modes !== 'object' || modes === null || Array.isArray(modes)) {
    throw Errors.invalidDefinition('"modes" must map mode names to configurations');
  }

  const result = new Map<string, WiringConfig>();
  for (const [name, config] of Object.entries(modes)) {
    result.set(name, normalizeWiringConfig(name, config));
  }
  return result;
}

/**
 * Define every mode in a YAML document
 * @returns names of the modes defined, in document order
 */
export function loadModesFromYaml(manager: ModeManager, text: string): string[] {
  const modes = parseModesYaml(text);
  for (const [name, config] of modes) {
    manager.defineMode(name, config);
  }
  return Array.from(modes.keys());
}

export function loadModesFromFile(manager: ModeManager, filePath: string): string[] {
  return loadModesFromYaml(manager, fs.readFileSync(filePath, 'utf-8'));
}
