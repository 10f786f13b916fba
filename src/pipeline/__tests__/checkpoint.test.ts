import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { appendFileSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { AuditLog, CheckpointStore } from '../checkpoint.js';

describe('CheckpointStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'disnet-etl-checkpoint-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns null before the first save', () => {
    expect(new CheckpointStore(join(dir, 'checkpoints', 'run.chkpt')).load()).toBeNull();
  });

  it('round-trips the last processed index as plain text', () => {
    const path = join(dir, 'checkpoints', 'run.chkpt');
    const store = new CheckpointStore(path);
    store.save(41);
    store.save(42);
    expect(readFileSync(path, 'utf-8')).toBe('42');
    expect(new CheckpointStore(path).load()).toBe(42);
  });

  it('ignores unreadable content', () => {
    const path = join(dir, 'run.chkpt');
    writeFileSync(path, 'not-a-number');
    expect(new CheckpointStore(path).load()).toBeNull();
    writeFileSync(path, '  \n');
    expect(new CheckpointStore(path).load()).toBeNull();
  });
});

describe('AuditLog', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'disnet-etl-audit-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends one JSON line per skipped combination', () => {
    const path = join(dir, 'audit', 'skipped.jsonl');
    const audit = new AuditLog(path);
    audit.recordUnresolvable(7, 'drug', 'Unknown', 1);
    audit.recordUnresolvable(9, 'cell_line', 'Nowhere', null);
    audit.recordFailure(9, 'drug', new Error('HTTP 503'));

    const lines = readFileSync(path, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(3);

    const records = audit.read();
    expect(records[0]).toMatchObject({ combination_id: 7, stage: 'drug', entity: 'Unknown', code: 1 });
    expect(records[1]).toMatchObject({ combination_id: 9, stage: 'cell_line', entity: 'Nowhere', code: null });
    expect(records[2]).toMatchObject({ combination_id: 9, stage: 'drug', message: 'HTTP 503' });
    expect(audit.readIndices()).toEqual(new Set([7, 9]));
  });

  it('skips malformed lines', () => {
    const path = join(dir, 'skipped.jsonl');
    const audit = new AuditLog(path);
    audit.recordUnresolvable(1, 'drug', 'Unknown', 2);
    appendFileSync(path, '{"broken":\n{"combination_id":"x"}\n');
    audit.recordUnresolvable(2, 'drug', 'Other', 3);

    expect(audit.read().map((r) => r.combination_id)).toEqual([1, 2]);
  });

  it('reads nothing from a missing file', () => {
    expect(new AuditLog(join(dir, 'none.jsonl')).read()).toEqual([]);
  });
});
