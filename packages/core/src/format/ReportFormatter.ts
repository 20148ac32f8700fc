/**
 * Report output shapes
 *
 * - reference: the inspect form of the reference runtime's branch hash
 * - json: records as tuples, for other tools
 * - summary: a few lines for humans
 */

import type {
  BranchCoverageSummary,
  BranchDescriptor,
  BranchRecord,
  DescriptorTag,
  DescriptorTuple,
} from '@forkcov/types';

export type ReportFormat = 'reference' | 'json' | 'summary';

export const REPORT_FORMATS: readonly ReportFormat[] = ['reference', 'json', 'summary'];

export function toTuple(descriptor: BranchDescriptor): DescriptorTuple {
  return [
    descriptor.tag,
    descriptor.locationId,
    descriptor.startLine,
    descriptor.startColumn,
    descriptor.endLine,
    descriptor.endColumn,
  ];
}

const PLAIN_SYMBOL = /^[a-z_][a-z0-9_]*$/;

function inspectSymbol(tag: DescriptorTag): string {
  return PLAIN_SYMBOL.test(tag) ? `:${tag}` : `:${JSON.stringify(tag)}`;
}

function inspectDescriptor(descriptor: BranchDescriptor): string {
  const [tag, ...numbers] = toTuple(descriptor);
  return `[${[inspectSymbol(tag), ...numbers].join(', ')}]`;
}

export function formatReferenceReport(records: readonly BranchRecord[]): string {
  const entries = records.map(record => {
    const branches = record.branches
      .map(branch => `${inspectDescriptor(branch.descriptor)}=>${branch.count}`)
      .join(', ');
    return `${inspectDescriptor(record.condition)}=>{${branches}}`;
  });
  return `{${entries.join(', ')}}`;
}

export interface JsonBranchRecord {
  condition: DescriptorTuple;
  branches: Array<[DescriptorTuple, number]>;
}

export function toJsonReport(records: readonly BranchRecord[]): JsonBranchRecord[] {
  return records.map(record => ({
    condition: toTuple(record.condition),
    branches: record.branches.map((branch): [DescriptorTuple, number] => [toTuple(branch.descriptor), branch.count]),
  }));
}

export function formatSummary(summary: BranchCoverageSummary): string {
  const percent = summary.branches === 0
    ? 'n/a'
    : `${((summary.coveredBranches / summary.branches) * 100).toFixed(1)}%`;
  return [
    `Branch constructs: ${summary.constructs} (${summary.coveredConstructs} covered)`,
    `Branches: ${summary.branches} (${summary.coveredBranches} covered, ${percent})`,
  ].join('\n');
}
