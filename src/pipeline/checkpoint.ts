import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { z } from 'zod';

import { log } from '../shared/debug.js';
import { errorMessage } from '../shared/errors.js';

export type AuditStage = 'drug' | 'cell_line';

/**
 * One skipped combination. Unresolvable entities carry `entity` and `code`;
 * unexpected failures carry `message` instead.
 */
export const AuditRecordSchema = z.union([
  z.object({
    combination_id: z.number().int(),
    stage: z.enum(['drug', 'cell_line']),
    entity: z.string(),
    code: z.number().int().nullable(),
    timestamp: z.string(),
  }),
  z.object({
    combination_id: z.number().int(),
    stage: z.enum(['drug', 'cell_line']),
    message: z.string(),
    timestamp: z.string(),
  }),
]);

export type AuditRecord = z.infer<typeof AuditRecordSchema>;

/**
 * Last successfully processed source index, stored as a single integer.
 */
export class CheckpointStore {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
    mkdirSync(dirname(path), { recursive: true });
  }

  /**
   * Null when there is no checkpoint yet, or it cannot be read.
   */
  load(): number | null {
    if (!existsSync(this.path)) {
      return null;
    }
    const raw = readFileSync(this.path, 'utf-8').trim();
    const index = Number(raw);
    if (raw === '' || !Number.isInteger(index)) {
      log('error', 'checkpoint', 'Ignoring unreadable checkpoint', { path: this.path, content: raw });
      return null;
    }
    return index;
  }

  save(index: number): void {
    writeFileSync(this.path, String(index), 'utf-8');
  }
}

/**
 * Append-only JSON-lines record of every skipped combination.
 */
export class AuditLog {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
    mkdirSync(dirname(path), { recursive: true });
  }

  recordUnresolvable(
    combinationId: number,
    stage: AuditStage,
    entity: string,
    code: number | null,
  ): void {
    this.append({
      combination_id: combinationId,
      stage,
      entity,
      code,
      timestamp: new Date().toISOString(),
    });
  }

  recordFailure(combinationId: number, stage: AuditStage, error: unknown): void {
    this.append({
      combination_id: combinationId,
      stage,
      message: errorMessage(error),
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Every well-formed record in file order. Malformed lines are logged and
   * left out.
   */
  read(): AuditRecord[] {
    if (!existsSync(this.path)) {
      return [];
    }
    const records: AuditRecord[] = [];
    const lines = readFileSync(this.path, 'utf-8').split('\n');
    lines.forEach((line, i) => {
      if (line.trim() === '') return;
      try {
        records.push(AuditRecordSchema.parse(JSON.parse(line)));
      } catch (err) {
        log('warn', 'audit', 'Skipping malformed audit line', { line: i + 1, error: errorMessage(err) });
      }
    });
    return records;
  }

  /**
   * Distinct combination ids with at least one audit record.
   */
  readIndices(): Set<number> {
    return new Set(this.read().map((r) => r.combination_id));
  }

  private append(record: AuditRecord): void {
    appendFileSync(this.path, JSON.stringify(record) + '\n', 'utf-8');
  }
}
