import type { AuditLog, CheckpointStore } from '../pipeline/checkpoint.js';
import type { LocalMirror } from '../staging/source-mirror.js';
import type { StagingCellLineStore } from '../staging/staging-cell-lines.js';
import type { StagingDrugStore } from '../staging/staging-drugs.js';
import { CellLineStage, DrugStage } from '../staging/status.js';

export interface StatusDeps {
  drugStaging: StagingDrugStore;
  cellLineStaging: StagingCellLineStore;
  checkpoint: CheckpointStore;
  audit: AuditLog;
  /** Omitted when no local mirror is configured. */
  mirror?: LocalMirror | null;
}

export interface StatusReport {
  drugs: Record<string, number>;
  cellLines: Record<string, number>;
  mirror: Record<string, number> | null;
  checkpoint: number | null;
  auditedCombinations: number;
}

function labelCounts(counts: Map<number, number>, label: (status: number) => string): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [status, count] of [...counts].sort((a, b) => a[0] - b[0])) {
    out[label(status)] = count;
  }
  return out;
}

function drugLabel(status: number): string {
  return DrugStage[status] ?? `status ${status}`;
}

function cellLineLabel(status: number): string {
  return CellLineStage[status] ?? `status ${status}`;
}

/**
 * Counts per staging status, mirror processing status, the streaming
 * checkpoint and the number of audited combinations.
 */
export function collectStatus(deps: StatusDeps): StatusReport {
  return {
    drugs: labelCounts(deps.drugStaging.countByStatus(), drugLabel),
    cellLines: labelCounts(deps.cellLineStaging.countByStatus(), cellLineLabel),
    mirror: deps.mirror ? Object.fromEntries(deps.mirror.countByStatus()) : null,
    checkpoint: deps.checkpoint.load(),
    auditedCombinations: deps.audit.readIndices().size,
  };
}

function formatCounts(title: string, counts: Record<string, number>): string[] {
  const entries = Object.entries(counts);
  if (entries.length === 0) {
    return [`${title}: (empty)`];
  }
  return [`${title}:`, ...entries.map(([label, count]) => `  ${label}: ${count}`)];
}

export function formatStatus(report: StatusReport): string {
  const lines = [
    ...formatCounts('Staged drugs', report.drugs),
    ...formatCounts('Staged cell lines', report.cellLines),
  ];
  if (report.mirror) {
    lines.push(...formatCounts('Mirror combinations', report.mirror));
  }
  lines.push(`Checkpoint: ${report.checkpoint ?? 'none'}`);
  lines.push(`Audited combinations: ${report.auditedCombinations}`);
  return lines.join('\n');
}
