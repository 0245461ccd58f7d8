/**
 * Resolved-config diagnostics
 *
 * After normalization every node's final configuration is written to
 * `<dir>/<nodeId>.json` so that authors can see exactly what will be
 * validated and packed.
 */

import { join } from 'path';

import type { ComponentLookup, ResolvedNode } from '../../types/index.js';
import { ensureDir, writeJsonFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

function snapshotFileName(nodeId: string): string {
  return `${nodeId.replace(/[\\/]/g, '_')}.json`;
}

export async function writeResolvedConfigs(
  dir: string,
  nodes: readonly ResolvedNode[],
  components: ComponentLookup
): Promise<string[]> {
  await ensureDir(dir);

  const written: string[] = [];
  for (const node of nodes) {
    const component = components.get(node.componentKey);
    const filePath = join(dir, snapshotFileName(node.nodeId));
    await writeJsonFile(filePath, {
      node_id: node.nodeId,
      component: component.name,
      version: component.version,
      config: node.config
    });
    written.push(filePath);
  }

  logger.debug(`Wrote ${written.length} resolved config snapshot(s) to ${dir}`);
  return written;
}
