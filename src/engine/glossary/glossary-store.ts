/**
 * Glossary persistence using LowDB
 *
 * Reads either `{ "entries": [{ "source", "target" }] }` or a plain
 * `{ "term": "translation" }` object; always writes the `entries` form.
 */

import { Low, type Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import path from 'path';
import fs from 'fs';
import { z } from 'zod';
import type { Glossary, GlossaryEntry } from '../types/common.js';
import { ConfigurationError } from '../errors.js';
import { createInitialContext, glossaryToEntries } from '../context/context-carrier.js';

const entriesFileSchema = z.object({
  entries: z.array(
    z.object({
      source: z.string(),
      target: z.string(),
    })
  ),
});

const mapFileSchema = z.record(z.string(), z.string());

export interface GlossaryFile {
  entries: GlossaryEntry[];
}

export class GlossaryStore {
  private db: Low<unknown>;
  private readonly label: string;
  private readonly directory: string | undefined;

  constructor(adapter: Adapter<unknown>, options: { label?: string; directory?: string } = {}) {
    this.db = new Low<unknown>(adapter, null);
    this.label = options.label ?? 'glossary';
    this.directory = options.directory;
  }

  static fromFile(filePath: string): GlossaryStore {
    return new GlossaryStore(new JSONFile<unknown>(filePath), {
      label: filePath,
      directory: path.dirname(filePath),
    });
  }

  /**
   * Entries in file order. A missing file is an empty glossary; an empty or
   * malformed file is a ConfigurationError.
   */
  async loadEntries(): Promise<GlossaryEntry[]> {
    try {
      await this.db.read();
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigurationError(`Glossary file ${this.label} is not valid JSON: ${error.message}`);
      }
      throw error;
    }
    const data = this.db.data;
    if (data === null || data === undefined) {
      return [];
    }

    const entriesFile = entriesFileSchema.safeParse(data);
    if (entriesFile.success) {
      return entriesFile.data.entries;
    }

    const mapFile = mapFileSchema.safeParse(data);
    if (mapFile.success) {
      return Object.entries(mapFile.data).map(([source, target]) => ({ source, target }));
    }

    throw new ConfigurationError(
      `Invalid glossary file ${this.label}: expected { "entries": [...] } or a { "term": "translation" } object`
    );
  }

  /**
   * Glossary with first-write-wins applied to the stored entries
   */
  async load(): Promise<Glossary> {
    const entries = await this.loadEntries();
    const glossary = createInitialContext(entries).glossary;
    console.log(`[GlossaryStore] 📖 Loaded ${glossary.size} terms from ${this.label}`);
    return glossary;
  }

  async save(glossary: Glossary): Promise<void> {
    if (this.directory && !fs.existsSync(this.directory)) {
      fs.mkdirSync(this.directory, { recursive: true });
    }

    const file: GlossaryFile = { entries: glossaryToEntries(glossary) };
    this.db.data = file;
    await this.db.write();
    console.log(`[GlossaryStore] 💾 Saved ${glossary.size} terms to ${this.label}`);
  }
}
