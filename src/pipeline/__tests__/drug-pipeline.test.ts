import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { describeDrugError } from '../../shared/errors.js';
import type { SourceIds } from '../../shared/types.js';
import { LocalMirror } from '../../staging/source-mirror.js';
import { StagingDrugStore } from '../../staging/staging-drugs.js';
import { DrugStage } from '../../staging/status.js';
import { openTestDatabase } from '../../storage/__tests__/test-utils.js';
import { DrugRepository } from '../../warehouse/drug-repository.js';
import { SourceRepository } from '../../warehouse/source-repository.js';
import { StagedDrugPipeline } from '../drug-pipeline.js';
import { fakeClients, sampleWorld, type FakeClients, type FakeWorld } from './fakes.js';

describe('StagedDrugPipeline', () => {
  let ctx: ReturnType<typeof openTestDatabase>;
  let world: FakeWorld;
  let clients: FakeClients;
  let staging: StagingDrugStore;
  let drugs: DrugRepository;
  let sourceIds: SourceIds;

  beforeEach(() => {
    ctx = openTestDatabase();
    world = sampleWorld();
    clients = fakeClients(world);
    staging = new StagingDrugStore(ctx.edb.db);
    drugs = new DrugRepository(ctx.edb.db);
    sourceIds = new SourceRepository(ctx.edb.db).resolveSourceIds();
  });

  afterEach(() => {
    ctx.cleanup();
  });

  function pipeline(options: { localMode?: boolean; mirror?: LocalMirror; batchSize?: number } = {}) {
    return new StagedDrugPipeline(
      { staging, drugs, sourceIds, ...clients, mirror: options.mirror ?? null },
      { batchSize: options.batchSize ?? 100, localMode: options.localMode ?? false },
    );
  }

  it('resolves drugs through every stage and persists them', async () => {
    const summaries = await pipeline({ batchSize: 1 }).run(['5-FU(approved)', 'ABT-888', 'Unknown']);

    expect(summaries).toEqual([
      { stage: 'drug.stage1', processed: 3, advanced: 2, failed: 1 },
      { stage: 'drug.stage2', processed: 2, advanced: 2, failed: 0 },
      { stage: 'drug.stage3', processed: 2, advanced: 2, failed: 0 },
      { stage: 'drug.persist', processed: 2, advanced: 2, failed: 0 },
    ]);

    expect(staging.get('5-FU')?.status).toBe(DrugStage.FETCHED);
    const unknown = staging.get('Unknown');
    expect(unknown?.status).toBe(DrugStage.FAILED);
    expect(unknown?.errorCode).toBe(1);
    expect(unknown?.errorMsg).toBe(describeDrugError(1));

    expect(drugs.getChemblIdFor('3385', sourceIds.pubchem)).toBe('CHEMBL185');
    expect(drugs.getRawDrug('3385', sourceIds.pubchem)?.drugName).toBe('Fluorouracil');
    expect(drugs.getChemblDrug('CHEMBL185')).toEqual({
      drugId: 'CHEMBL185',
      sourceId: sourceIds.chembl,
      drugName: 'FLUOROURACIL',
      molecularType: 'Small molecule',
      chemicalStructure: 'O=c1[nH]cc(F)c(=O)[nH]1',
      inchiKey: 'TEST-INCHI-5FU',
    });
  });

  it('makes no requests when re-run over finished stages', async () => {
    const p = pipeline();
    await p.run(['5-FU', 'ABT-888']);
    expect(clients.source.getDrug).toHaveBeenCalledTimes(2);

    const again = await p.run(['5-FU', 'ABT-888']);
    expect(clients.source.getDrug).toHaveBeenCalledTimes(2);
    expect(clients.crossRef.getCompoundMapping).toHaveBeenCalledTimes(2);
    expect(clients.molecules.getMolecule).toHaveBeenCalledTimes(2);
    expect(again.slice(0, 3).map((s) => s.processed)).toEqual([0, 0, 0]);
  });

  it('records the stage at which a drug dropped out', async () => {
    world.sourceDrugs.set('NoMapping', { foreignId: '111', officialName: null, structure: null });
    world.sourceDrugs.set('NoMolecule', { foreignId: '222', officialName: null, structure: null });
    world.mappings.set('222', { chemblId: 'CHEMBL_GONE', inchiKey: null });

    await pipeline().run(['NoMapping', 'NoMolecule']);

    expect(staging.get('NoMapping')?.errorCode).toBe(2);
    expect(staging.get('NoMapping')?.pubchemId).toBe('111');
    expect(staging.get('NoMolecule')?.errorCode).toBe(3);
    expect(staging.get('NoMolecule')?.chemblId).toBe('CHEMBL_GONE');
    expect(staging.countByStatus()).toEqual(new Map([[DrugStage.FAILED, 2]]));
  });

  it('fails only the row whose lookup throws', async () => {
    clients.source.getDrug.mockImplementation(async (name) => {
      if (name === 'ABT-888') throw new Error('connection reset');
      return world.sourceDrugs.get(name) ?? null;
    });

    const [stage1] = await pipeline().run(['5-FU', 'ABT-888']);

    expect(stage1).toEqual({ stage: 'drug.stage1', processed: 2, advanced: 1, failed: 1 });
    const failed = staging.get('ABT-888');
    expect(failed?.status).toBe(DrugStage.FAILED);
    expect(failed?.errorCode).toBeNull();
    expect(failed?.errorMsg).toBe('connection reset');
    expect(staging.get('5-FU')?.status).toBe(DrugStage.FETCHED);
  });

  it('uses only the local dump in local mode', async () => {
    ctx.edb.db.exec(`
      INSERT INTO drugs (drug_name, pubchem_cid, smiles) VALUES ('5-FU(approved)', 'CIDs00003385', 'C1=C(C(=O)NC(=O)N1)F')
    `);
    const mirror = new LocalMirror(ctx.edb.db);

    await pipeline({ localMode: true, mirror }).run(['5-FU', 'ABT-888']);

    expect(clients.source.getDrug).not.toHaveBeenCalled();
    expect(staging.get('5-FU')?.status).toBe(DrugStage.FETCHED);
    expect(staging.get('5-FU')?.pubchemId).toBe('3385');
    expect(staging.get('ABT-888')?.errorCode).toBe(1);
  });

  it('prefers the local dump before the network', async () => {
    ctx.edb.db.exec(`INSERT INTO drugs (drug_name, pubchem_cid, smiles) VALUES ('ABT-888', '11960529', NULL)`);
    const mirror = new LocalMirror(ctx.edb.db);

    await pipeline({ mirror }).run(['5-FU', 'ABT-888']);

    expect(clients.source.getDrug).toHaveBeenCalledTimes(1);
    expect(clients.source.getDrug).toHaveBeenCalledWith('5-FU');
  });
});
