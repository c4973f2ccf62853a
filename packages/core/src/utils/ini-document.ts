import fs from 'fs';
import { denormalizeKey, normalizeKey } from '../key-encoder.js';

interface IniSection {
  name: string;
  entries: Map<string, { key: string; value: string }>;
}

const COMMENT_PREFIXES = [';', '#'];

/**
 * Minimal in-memory INI document: ordered sections holding ordered
 * `key=value` entries. Section and key lookups ignore case, written names
 * keep the case they were first seen with. Keys pass through
 * {@link normalizeKey} on the way to disk.
 */
export class IniDocument {
  private readonly sections = new Map<string, IniSection>();

  public static parse(text: string): IniDocument {
    const document = new IniDocument();
    let current: IniSection | undefined;

    const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
    for (const rawLine of source.split(/\r\n|\n|\r/)) {
      const line = rawLine.trim();
      if (!line || COMMENT_PREFIXES.some((prefix) => line.startsWith(prefix))) {
        continue;
      }

      if (line.startsWith('[') && line.endsWith(']')) {
        current = document.ensureSection(line.slice(1, -1).trim());
        continue;
      }

      if (!current) {
        continue;
      }

      const separator = rawLine.indexOf('=');
      if (separator === -1) {
        continue;
      }

      const key = denormalizeKey(rawLine.slice(0, separator).trim());
      if (!key) {
        continue;
      }
      current.entries.set(key.toLowerCase(), { key, value: rawLine.slice(separator + 1) });
    }

    return document;
  }

  /**
   * Reads a document from disk. A missing file yields an empty document;
   * any other read failure is thrown as-is.
   */
  public static load(filePath: string): IniDocument {
    let contents: string;
    try {
      contents = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') {
        return new IniDocument();
      }
      throw error;
    }
    return IniDocument.parse(contents);
  }

  public sectionNames(): string[] {
    return Array.from(this.sections.values(), (section) => section.name);
  }

  public hasSection(name: string): boolean {
    return this.sections.has(name.toLowerCase());
  }

  public readSection(name: string): Array<[string, string]> {
    const section = this.sections.get(name.toLowerCase());
    if (!section) {
      return [];
    }
    return Array.from(section.entries.values(), (entry) => [entry.key, entry.value]);
  }

  public read(sectionName: string, key: string): string | undefined {
    return this.sections.get(sectionName.toLowerCase())?.entries.get(key.toLowerCase())?.value;
  }

  public write(sectionName: string, key: string, value: string): void {
    const section = this.ensureSection(sectionName);
    const existing = section.entries.get(key.toLowerCase());
    section.entries.set(key.toLowerCase(), { key: existing?.key ?? key, value });
  }

  public eraseSection(name: string): void {
    this.sections.delete(name.toLowerCase());
  }

  public toString(): string {
    const blocks: string[] = [];
    for (const section of this.sections.values()) {
      const lines = [`[${section.name}]`];
      for (const entry of section.entries.values()) {
        lines.push(`${normalizeKey(entry.key)}=${entry.value}`);
      }
      blocks.push(lines.join('\n'));
    }
    return blocks.length ? `${blocks.join('\n\n')}\n` : '';
  }

  public writeFile(filePath: string): void {
    fs.writeFileSync(filePath, this.toString(), 'utf8');
  }

  private ensureSection(name: string): IniSection {
    const id = name.toLowerCase();
    let section = this.sections.get(id);
    if (!section) {
      section = { name, entries: new Map() };
      this.sections.set(id, section);
    }
    return section;
  }
}
