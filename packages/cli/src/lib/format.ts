import type { ArtifactIdentity, ErrorSummary } from '@bundlekeeper/core';

import type { EmbedCommandReport, MergeCommandReport, ReconcileCommandReport, StageCommandReport } from './project.js';
import type { ExportReport } from './export.js';

function errorLines(errors: ErrorSummary): string[] {
  return [`errors: ${errors.total}`, ...errors.lines.map((line) => `- ${line}`)];
}

function divergenceLines(report: { divergences: MergeCommandReport['divergences'] }): string[] {
  return [
    `divergences: ${report.divergences.length}`,
    ...report.divergences.map((d) => `- ${d.name}: ${d.platform} [${d.dependencies.join(', ')}] differs from ${d.basePlatform} [${d.baseDependencies.join(', ')}]`)
  ];
}

export function mergeTable(report: MergeCommandReport): string[] {
  const lines = [`platforms: ${report.platforms.join(', ')}`, `artifacts: ${report.descriptions.length}`];
  for (const d of report.descriptions) {
    lines.push(`- ${d.name} (${Object.keys(d.hashes).join(', ')})${d.dependencies.length > 0 ? ` -> ${d.dependencies.join(', ')}` : ''}`);
  }
  return [...lines, ...divergenceLines(report), ...errorLines(report.errors)];
}

export function stageTable(report: StageCommandReport): string[] {
  return [
    `platforms: ${report.platforms.join(', ')}`,
    `staged: ${report.staged.length}`,
    ...report.staged.map((s) => `- ${s.fileName}`),
    `artifacts: ${report.artifacts}`,
    report.descriptionsWritten ? `descriptions: ${report.descriptionsFile}` : `descriptions: ${report.descriptionsFile} (kept, not every target built)`,
    ...divergenceLines(report),
    ...errorLines(report.errors)
  ];
}

export function reconcileTable(report: ReconcileCommandReport): string[] {
  const lines = [
    `remote: ${report.baseUrl}`,
    `files: ${report.total}`,
    `published: ${report.published.length}`,
    `needs_upload: ${report.needsUpload.length}`,
    ...report.needsUpload.map((f) => `- ${f}`),
    `indeterminate: ${report.indeterminate.length}`,
    ...report.indeterminate.map((m) => `- ${m}`)
  ];
  if (report.cancelled.length > 0) lines.push(`cancelled: ${report.cancelled.length}`);
  if (report.malformed.length > 0) lines.push(`malformed: ${report.malformed.length}`, ...report.malformed.map((m) => `- ${m}`));
  return lines;
}

export function embedTable(report: EmbedCommandReport): string[] {
  return [
    `platform: ${report.platform}`,
    `copied: ${report.copied.length}`,
    ...report.copied.map((name) => `- ${name}`),
    `skipped: ${report.skipped.length}`,
    ...report.skipped.map((s) => `- ${s.name} (${s.reason})`)
  ];
}

export function identityTable(identity: ArtifactIdentity): string[] {
  return [`name: ${identity.name}`, `platform: ${identity.platform}`, `hash: ${identity.hash}`];
}

export function exportTable(report: ExportReport): string[] {
  return [`archive: ${report.outPath}`, `files: ${report.files.length}`, ...report.files.map((f) => `- ${f.path} ${f.size} ${f.sha256}`), `validated: ${report.validated}`];
}
