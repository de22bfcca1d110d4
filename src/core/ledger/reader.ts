import { readFile } from 'node:fs/promises';

import { describeError } from '../errors.js';
import { isErrnoException } from '../../utils/fs.js';
import { LedgerEntrySchema, type LedgerEntry, type LedgerEventType } from './types.js';

export class LedgerReader {
  constructor(private ledgerPath: string) {}

  async readAll(): Promise<LedgerEntry[]> {
    const { entries } = await this.readAllSafe();
    return entries;
  }

  async readAllSafe(): Promise<{ entries: LedgerEntry[]; warnings: string[] }> {
    const warnings: string[] = [];
    const entries: LedgerEntry[] = [];

    const lines = await readJsonlLines(this.ledgerPath);
    for (const [i, line] of lines.entries()) {
      try {
        const obj: unknown = JSON.parse(line);
        entries.push(LedgerEntrySchema.parse(obj));
      } catch (err) {
        // Common corruption: trailing partial line. Stop there; mid-file garbage is skipped.
        const isLast = i === lines.length - 1;
        warnings.push(`ledger parse failed at line ${i + 1}${isLast ? ' (last line)' : ''}: ${describeError(err)}`);
        if (isLast) break;
      }
    }

    return { entries, warnings };
  }

  async tail(n: number): Promise<LedgerEntry[]> {
    const { entries } = await this.readAllSafe();
    return entries.slice(Math.max(0, entries.length - n));
  }

  async findByType(type: LedgerEventType): Promise<LedgerEntry[]> {
    const { entries } = await this.readAllSafe();
    return entries.filter((e) => e.type === type);
  }

  async verifyIntegrity(): Promise<{ ok: boolean; message?: string }> {
    const { entries, warnings } = await this.readAllSafe();
    if (warnings.length) {
      return { ok: false, message: warnings.join('\n') };
    }
    for (const [i, entry] of entries.entries()) {
      const expected = i + 1;
      if (entry.seq !== expected) {
        return { ok: false, message: `Sequence gap at index ${i} (expected seq=${expected}, got ${entry.seq})` };
      }
    }
    return { ok: true };
  }
}

async function readJsonlLines(path: string): Promise<string[]> {
  try {
    const content = await readFile(path, 'utf8');
    return content
      .split('\n')
      .map((l) => l.trim())
      .filter(Boolean);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return [];
    throw err;
  }
}
