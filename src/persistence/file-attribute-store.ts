/**
 * JSON file attribute store - one file per node id
 */

import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import type { Logger } from '../logging/logger';
import type { AttributeRecord, AttributeStore } from './attribute-store';

const readFile = promisify(fs.readFile);
const writeFile = promisify(fs.writeFile);
const readdir = promisify(fs.readdir);
const mkdir = promisify(fs.mkdir);
const rename = promisify(fs.rename);
const unlink = promisify(fs.unlink);

const SOURCE = 'FileAttributeStore';
const EXTENSION = '.json';

function isRecord(value: unknown): value is AttributeRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && Reflect.get(error, 'code') === code;
}

export class FileAttributeStore implements AttributeStore {
  // Writes to one file are chained so a later save never lands first
  private writeLocks = new Map<string, Promise<void>>();

  constructor(private readonly directory: string, private readonly logger?: Logger) {}

  async load(nodeId: string): Promise<AttributeRecord | null> {
    let text: string;
    try {
      text = await readFile(this.pathFor(nodeId), 'utf-8');
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return null;
      throw error;
    }

    const parsed: unknown = JSON.parse(text);
    if (!isRecord(parsed)) {
      this.logger?.warn(SOURCE, `Ignoring ${nodeId}: stored value is not an object`);
      return null;
    }
    return parsed;
  }

  async save(nodeId: string, attributes: AttributeRecord): Promise<void> {
    const filePath = this.pathFor(nodeId);
    const previous = this.writeLocks.get(filePath) ?? Promise.resolve();
    const write = previous
      .catch(() => undefined)
      .then(() => this.performWrite(filePath, JSON.stringify(attributes, null, 2)));
    this.writeLocks.set(filePath, write);

    try {
      await write;
    } finally {
      if (this.writeLocks.get(filePath) === write) {
        this.writeLocks.delete(filePath);
      }
    }
  }

  async delete(nodeId: string): Promise<boolean> {
    try {
      await unlink(this.pathFor(nodeId));
      return true;
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return false;
      throw error;
    }
  }

  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await readdir(this.directory);
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return [];
      throw error;
    }
    return files
      .filter(file => file.endsWith(EXTENSION))
      .map(file => decodeURIComponent(file.slice(0, -EXTENSION.length)))
      .sort();
  }

  private pathFor(nodeId: string): string {
    return path.join(this.directory, `${encodeURIComponent(nodeId)}${EXTENSION}`);
  }

  private async performWrite(filePath: string, content: string): Promise<void> {
    await mkdir(this.directory, { recursive: true });

    // Write to a temp file, then rename over the target
    const tempPath = `${filePath}.tmp`;
    try {
      await writeFile(tempPath, content);
      await rename(tempPath, filePath);
    } catch (error) {
      await unlink(tempPath).catch(() => undefined);
      throw error;
    }
  }
}
