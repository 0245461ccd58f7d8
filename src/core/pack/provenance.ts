import { execFile } from 'child_process';
import { promisify } from 'util';

import type { Provenance } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { getVersion } from '../../utils/package.js';

const execFileAsync = promisify(execFile);

export interface ProvenanceOptions {
  workspaceRoot: string;
  buildTime: Date;
  host?: string;
  notes?: string;
}

/**
 * Run a read-only git query in the workspace. Provenance is best effort: a
 * workspace outside a repository (or a machine without git) simply records
 * no commit or remote.
 */
async function readGit(args: string[], cwd: string): Promise<string | undefined> {
  try {
    const { stdout } = await execFileAsync('git', args, { cwd });
    const value = stdout.trim();
    return value.length > 0 ? value : undefined;
  } catch (error) {
    logger.debug(`git ${args.join(' ')} unavailable in ${cwd}`, error);
    return undefined;
  }
}

/**
 * Capture build provenance once per build. The determinism rerun reuses the
 * returned record so both archives carry identical provenance.
 */
export async function collectProvenance(options: ProvenanceOptions): Promise<Provenance> {
  const { workspaceRoot, buildTime, host, notes } = options;
  const [gitCommit, gitRepo] = await Promise.all([
    readGit(['rev-parse', 'HEAD'], workspaceRoot),
    readGit(['config', '--get', 'remote.origin.url'], workspaceRoot)
  ]);

  return {
    builder: `flowpack ${getVersion()}`,
    gitCommit,
    gitRepo,
    builtAtUtc: buildTime.toISOString(),
    host,
    notes
  };
}
