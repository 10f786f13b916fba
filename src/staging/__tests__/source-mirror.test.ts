import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { openTestDatabase } from '../../storage/__tests__/test-utils.js';
import { LocalMirror } from '../source-mirror.js';

describe('LocalMirror', () => {
  let ctx: ReturnType<typeof openTestDatabase>;
  let mirror: LocalMirror;

  beforeEach(() => {
    ctx = openTestDatabase(['mirror']);
    const db = ctx.edb.db;
    db.exec(`
      INSERT INTO drug_combinations (id, drug1, drug2, cell_line, hsa, bliss, loewe, zip, source) VALUES
        (2, '5-FU(approved)', 'ABT-888', 'A2058', 5.5369, 6.2566, -2.7507, 1.7183, 'ONEIL'),
        (1, 'Cisplatin', 'ABT-888', 'A2058', NULL, 1.5, NULL, NULL, NULL);
      INSERT INTO drugs (drug_name, pubchem_cid, smiles) VALUES
        ('5-FU(approved)', 'CIDs00003385', 'C1=C(C(=O)NC(=O)N1)F'),
        ('ABT-888', '11960529', NULL),
        ('Mystery', 'n/a', NULL),
        ('Gefitinib ( Approved )', '123631', NULL),
        ('Erlotinib(APPROVED)', '176870', NULL),
        ('Erlotinib', '176871', NULL);
      INSERT INTO cell_lines (cell_name, cosmic_id) VALUES
        ('A2058', ' 906793 '),
        ('NOCOSMIC', '');
    `);
    mirror = new LocalMirror(db);
  });

  afterEach(() => {
    ctx.cleanup();
  });

  it('lists pending combinations by id', () => {
    const pending = mirror.pendingCombinations();
    expect(pending.map((c) => c.id)).toEqual([1, 2]);
    expect(pending[0]).toEqual({
      id: 1,
      drug1: 'Cisplatin',
      drug2: 'ABT-888',
      cellLine: 'A2058',
      source: null,
      hsa: null,
      bliss: 1.5,
      loewe: null,
      zip: null,
    });
  });

  it('drops processed rows from the pending list', () => {
    mirror.setStatus(1, 'processed');
    mirror.setStatus(2, 'error');
    expect(mirror.pendingCombinations()).toEqual([]);
    expect(mirror.countByStatus()).toEqual(
      new Map([
        ['error', 1],
        ['processed', 1],
      ]),
    );
  });

  it('finds drugs by normalized name and parses their CID', () => {
    expect(mirror.findDrug('5-FU')).toEqual({
      foreignId: '3385',
      officialName: '5-FU(approved)',
      structure: 'C1=C(C(=O)NC(=O)N1)F',
    });
    expect(mirror.findDrug('ABT-888')?.foreignId).toBe('11960529');
    expect(mirror.findDrug('Mystery')).toBeNull();
    expect(mirror.findDrug('Absent')).toBeNull();
  });

  it('matches the approved marker in any case or spacing', () => {
    expect(mirror.findDrug('Gefitinib')).toEqual({
      foreignId: '123631',
      officialName: 'Gefitinib ( Approved )',
      structure: null,
    });
    expect(mirror.findDrug('Gefitinib (approved)')?.foreignId).toBe('123631');
  });

  it('prefers the unmarked spelling when both are in the dump', () => {
    expect(mirror.findDrug('Erlotinib')?.foreignId).toBe('176871');
  });

  it('returns trimmed COSMIC ids', () => {
    expect(mirror.findCosmicId('A2058')).toBe('906793');
    expect(mirror.findCosmicId('NOCOSMIC')).toBeNull();
    expect(mirror.findCosmicId('Absent')).toBeNull();
  });
});
