import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { CellLineNotResolvableError, DrugNotResolvableError } from '../../shared/errors.js';
import type { SourceIds } from '../../shared/types.js';
import { openTestDatabase } from '../../storage/__tests__/test-utils.js';
import { CellLineRepository } from '../../warehouse/cell-line-repository.js';
import { DrugRepository } from '../../warehouse/drug-repository.js';
import { SourceRepository } from '../../warehouse/source-repository.js';
import { CellLineResolver } from '../cell-line-resolver.js';
import { DrugResolver } from '../drug-resolver.js';
import { normalizeDrugName, uniqueDrugNames } from '../normalize.js';
import { fakeClients, sampleWorld, type FakeClients, type FakeWorld } from './fakes.js';

describe('normalizeDrugName', () => {
  it('strips the approval marker', () => {
    expect(normalizeDrugName('5-FU(approved)')).toBe('5-FU');
    expect(normalizeDrugName(' Cisplatin ( Approved ) ')).toBe('Cisplatin');
    expect(normalizeDrugName('ABT-888')).toBe('ABT-888');
  });

  it('deduplicates after normalizing', () => {
    expect(uniqueDrugNames(['5-FU(approved)', '5-FU', ' ', 'ABT-888'])).toEqual(['5-FU', 'ABT-888']);
  });
});

describe('resolvers', () => {
  let ctx: ReturnType<typeof openTestDatabase>;
  let world: FakeWorld;
  let clients: FakeClients;
  let sourceIds: SourceIds;

  beforeEach(() => {
    ctx = openTestDatabase(['warehouse']);
    world = sampleWorld();
    clients = fakeClients(world);
    sourceIds = new SourceRepository(ctx.edb.db).resolveSourceIds();
  });

  afterEach(() => {
    ctx.cleanup();
  });

  describe('DrugResolver', () => {
    function resolver(): DrugResolver {
      return new DrugResolver({ drugs: new DrugRepository(ctx.edb.db), sourceIds, ...clients });
    }

    it('resolves both drugs of a combination and caches them', async () => {
      const r = resolver();
      const [fu, abt] = await r.fetch(['5-FU(approved)', 'ABT-888']);
      expect(fu.raw.drugId).toBe('3385');
      expect(fu.chembl.drugId).toBe('CHEMBL185');
      expect(abt.chembl.drugName).toBe('VELIPARIB');

      await r.fetch(['5-FU']);
      expect(clients.source.getDrug).toHaveBeenCalledTimes(2);
    });

    it('reports the failing stage as a code', async () => {
      world.sourceDrugs.set('NoMapping', { foreignId: '111', officialName: null, structure: null });
      const r = resolver();

      expect(await r.resolve('Unknown')).toEqual({
        kind: 'unresolvable',
        code: 1,
        message: 'not found in DrugCombDB, despite being in a combination',
      });
      const outcome = await r.resolve('NoMapping');
      expect(outcome.kind === 'unresolvable' ? outcome.code : null).toBe(2);
    });

    it('throws for the first unresolvable name and does not cache it', async () => {
      const r = resolver();
      const error = await r.fetch(['Unknown(approved)', '5-FU']).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(DrugNotResolvableError);
      expect(error instanceof DrugNotResolvableError ? [error.drugName, error.code] : null).toEqual(['Unknown', 1]);

      await r.resolve('Unknown');
      expect(clients.source.getDrug).toHaveBeenCalledTimes(2);
    });

    it('propagates service errors', async () => {
      clients.crossRef.getCompoundMapping.mockRejectedValue(new Error('HTTP 503'));
      await expect(resolver().fetch(['5-FU'])).rejects.toThrow('HTTP 503');
    });

    it('persists raw drug, cured drug and mapping', async () => {
      const drugs = new DrugRepository(ctx.edb.db);
      const r = new DrugResolver({ drugs, sourceIds, ...clients });
      r.persist(await r.fetch(['5-FU', 'ABT-888']));
      expect(drugs.getChemblIdFor('11960529', sourceIds.pubchem)).toBe('CHEMBL506871');
    });
  });

  describe('CellLineResolver', () => {
    function resolver(cellLines = new CellLineRepository(ctx.edb.db)): CellLineResolver {
      return new CellLineResolver({ cellLines, sourceIds, ...clients });
    }

    it('resolves accession and disease, then serves from cache', async () => {
      const r = resolver();
      const first = await r.fetch('A2058');
      expect(first).toEqual({
        cellLine: {
          cellLineId: 'CVCL_1059',
          sourceId: sourceIds.cellosaurus,
          name: 'A2058',
          tissue: 'skin',
          diseaseId: 'C0025202',
        },
        disease: { umlsCui: 'C0025202', name: 'melanoma' },
        cached: false,
      });

      const second = await r.fetch('A2058');
      expect(second.cached).toBe(true);
      expect(clients.source.getCellLine).toHaveBeenCalledTimes(1);
    });

    it('persists a cached result that was never written', async () => {
      const cellLines = new CellLineRepository(ctx.edb.db);
      const r = resolver(cellLines);
      await r.fetch('A2058');
      const again = await r.fetch('A2058');
      expect(again.cached).toBe(true);
      r.persist(again);
      expect(cellLines.getByName('A2058')?.diseaseId).toBe('C0025202');
    });

    it('remembers unresolvable names', async () => {
      const r = resolver();
      await expect(r.fetch('Nowhere')).rejects.toBeInstanceOf(CellLineNotResolvableError);
      await expect(r.fetch('Nowhere')).rejects.toThrow("Cell line 'Nowhere' could not be resolved: not found in DrugCombDB");
      expect(clients.source.getCellLine).toHaveBeenCalledTimes(1);
    });

    it('keeps a cell line whose disease is unknown', async () => {
      world.diseases.delete('CVCL_1059');
      const result = await resolver().fetch('A2058');
      expect(result.disease).toBeNull();
      expect(result.cellLine.diseaseId).toBeNull();
      expect(clients.terminology.ncitToCui).not.toHaveBeenCalled();
    });

    it('persists each cell line once', async () => {
      const cellLines = new CellLineRepository(ctx.edb.db);
      const r = resolver(cellLines);
      r.persist(await r.fetch('A2058'));
      expect(cellLines.getByName('A2058')?.cellLineId).toBe('CVCL_1059');

      ctx.edb.db.exec('DELETE FROM cell_line');
      r.persist(await r.fetch('A2058'));
      expect(cellLines.getByName('A2058')).toBeNull();
    });

    it('bounds its memory of written cell lines', async () => {
      world.sourceCellLines.set('HT-29', { accession: 'CVCL_0320', tissue: 'colon' });
      const cellLines = new CellLineRepository(ctx.edb.db);
      const r = new CellLineResolver({ cellLines, sourceIds, ...clients }, 1);
      r.persist(await r.fetch('A2058'));
      r.persist(await r.fetch('HT-29'));

      ctx.edb.db.exec('DELETE FROM cell_line');
      r.persist(await r.fetch('A2058'));
      expect(cellLines.getByName('A2058')?.cellLineId).toBe('CVCL_1059');
      expect(cellLines.getByName('HT-29')).toBeNull();
    });
  });
});
