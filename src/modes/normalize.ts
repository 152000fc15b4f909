import { Errors } from '../errors';
import type { WiringConfig } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw Errors.invalidDefinition(`${where} must be a list of class names`);
  }
  return [...value];
}

/**
 * Validate an untrusted mode config and return a detached copy
 */
export function normalizeWiringConfig(name: string, input: unknown): WiringConfig {
  if (input === null || input === undefined) return {};
  if (!isRecord(input)) {
    throw Errors.invalidDefinition(`Mode '${name}' must be an object`);
  }

  const config: WiringConfig = {};

  if (input.base !== undefined) {
    if (typeof input.base !== 'string' || input.base === '') {
      throw Errors.invalidDefinition(`Mode '${name}': base must be a mode name`);
    }
    config.base = input.base;
  }

  if (input.nodes !== undefined) {
    config.nodes = stringList(input.nodes, `Mode '${name}': nodes`);
  }

  if (input.wiring !== undefined) {
    if (!isRecord(input.wiring)) {
      throw Errors.invalidDefinition(`Mode '${name}': wiring must map source classes to targets`);
    }
    const wiring: Record<string, string[]> = {};
    for (const [source, targets] of Object.entries(input.wiring)) {
      wiring[source] = stringList(targets, `Mode '${name}': wiring.${source}`);
    }
    config.wiring = wiring;
  }

  if (input.attributes !== undefined) {
    if (!isRecord(input.attributes)) {
      throw Errors.invalidDefinition(`Mode '${name}': attributes must map classes to values`);
    }
    const attributes: Record<string, Record<string, unknown>> = {};
    for (const [className, values] of Object.entries(input.attributes)) {
      if (!isRecord(values)) {
        throw Errors.invalidDefinition(`Mode '${name}': attributes.${className} must be an object`);
      }
      attributes[className] = { ...values };
    }
    config.attributes = attributes;
  }

  return config;
}
