import { readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import { GroundTruthSchema } from '@idslab/core';

export interface GroundTruthFile {
  path: string;
  mtimeMs: number;
}

export interface GroundTruthTotals {
  totalPacketsSent?: number;
  totalDurationSeconds?: number;
}

export interface GroundTruthLocatorOptions {
  scratchDir: string;
  prefix: string;
  pointerFile: string;
  endMarkerField: string;
}

/**
 * Finds the attack generator's ground-truth files
 * (`<scratchDir>/<prefix>*.json`) and maintains the pointer file naming the
 * one that belongs to the current iteration.
 */
export class GroundTruthLocator {
  constructor(private readonly opts: GroundTruthLocatorOptions) {}

  get pointerFile(): string {
    return this.opts.pointerFile;
  }

  async list(): Promise<GroundTruthFile[]> {
    let names: string[];
    try {
      names = await readdir(this.opts.scratchDir);
    } catch {
      return [];
    }
    const files: GroundTruthFile[] = [];
    for (const name of names.filter((n) => n.startsWith(this.opts.prefix) && n.endsWith('.json')).sort()) {
      const file = path.join(this.opts.scratchDir, name);
      try {
        files.push({ path: file, mtimeMs: (await stat(file)).mtimeMs });
      } catch {
        // removed between readdir and stat
      }
    }
    return files;
  }

  /** Most recently modified file; equal mtimes resolve to the greater name. */
  async newest(): Promise<string | null> {
    let best: GroundTruthFile | null = null;
    for (const file of await this.list()) {
      if (!best || file.mtimeMs > best.mtimeMs || (file.mtimeMs === best.mtimeMs && file.path > best.path)) {
        best = file;
      }
    }
    return best?.path ?? null;
  }

  async snapshot(): Promise<number> {
    return (await this.list()).length;
  }

  /** The file parses as a JSON object carrying the end-of-run field. */
  async hasEndMarker(file: string): Promise<boolean> {
    try {
      const parsed: unknown = JSON.parse(await readFile(file, 'utf-8'));
      return typeof parsed === 'object' && parsed !== null && this.opts.endMarkerField in parsed;
    } catch {
      return false;
    }
  }

  async writePointer(file: string): Promise<void> {
    await writeFile(this.opts.pointerFile, `${file}\n`);
  }

  async readPointer(): Promise<string | null> {
    try {
      const content = (await readFile(this.opts.pointerFile, 'utf-8')).trim();
      return content.length > 0 ? content : null;
    } catch {
      return null;
    }
  }

  /** Delete every ground-truth file and the pointer. */
  async clear(): Promise<void> {
    for (const file of await this.list()) {
      await rm(file.path, { force: true });
    }
    await rm(this.opts.pointerFile, { force: true });
  }

  /** Aggregate totals for logging; fields the file lacks are undefined. */
  async readTotals(file: string): Promise<GroundTruthTotals> {
    try {
      const result = GroundTruthSchema.safeParse(JSON.parse(await readFile(file, 'utf-8')));
      if (!result.success) return {};
      return {
        totalPacketsSent: result.data.totals?.total_packets_sent,
        totalDurationSeconds: result.data.totals?.total_duration,
      };
    } catch {
      return {};
    }
  }
}
