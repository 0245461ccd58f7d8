/**
 * @fileoverview Display logic for the pack commands
 *
 * Formats build summaries and inspection reports. Kept apart from the
 * pipeline so the same results can be rendered as text or JSON.
 */

import type { PackBuildSummary } from '../../types/index.js';
import { formatCount, formatPathForDisplay, getTreeConnector } from '../../utils/formatters.js';
import type { OutputPort } from '../ports/output.js';
import type { PackInspection } from './pack-inspect.js';

/**
 * Display a finished build
 */
export function displayPackBuildSummary(summary: PackBuildSummary, output: OutputPort, cwd: string): void {
  output.info(`Flow: ${summary.flowId} (${formatCount(summary.nodeCount, 'component node')})`);
  output.info(`Flow hash: ${summary.flowHash}`);

  output.info(`Components: ${summary.components.length}`);
  summary.components.forEach((component, index) => {
    output.info(`  ${getTreeConnector(index === summary.components.length - 1)}${component}`);
  });

  output.info(`Resolved configs: ${formatPathForDisplay(summary.diagnosticsDir, cwd)}`);
  if (summary.determinismVerified) {
    output.success('Rebuild produced identical bytes');
  }
}

/**
 * Display an inspection report; returns false when the pack has problems
 */
export function displayPackInspection(inspection: PackInspection, output: OutputPort, cwd: string): boolean {
  output.info(`Archive: ${formatPathForDisplay(inspection.path, cwd)}`);
  if (inspection.manifestHash) {
    output.info(`Manifest hash: ${inspection.manifestHash}`);
  }

  output.info(`Entries: ${inspection.entries.length}`);
  inspection.entries.forEach((entry, index) => {
    output.info(`  ${getTreeConnector(index === inspection.entries.length - 1)}${entry}`);
  });

  if (inspection.problems.length === 0) {
    output.success('All archived hashes match the manifest');
    return true;
  }

  for (const problem of inspection.problems) {
    output.error(problem);
  }
  return false;
}
