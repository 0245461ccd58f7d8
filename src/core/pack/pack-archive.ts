/**
 * Tar pack assembler
 *
 * Writes the archive described in archive-layout.ts. Output is reproducible:
 * entries are sorted by path and every header carries the same mtime, mode
 * and owner, so identical inputs give identical bytes.
 */

import { gunzipSync, gzipSync } from 'zlib';
import * as tar from 'tar-stream';

import { ARCHIVE_PATHS } from '../../constants/index.js';
import type { ArchiveAssembler, ArchiveAssemblyRequest, ArchiveAssemblyResult, JsonValue } from '../../types/index.js';
import { stringifyCanonicalJson } from '../../utils/canonical-json.js';
import { ArchiveAssemblyFailedError } from '../../utils/errors.js';
import { readBinaryFile, writeFileAtomic } from '../../utils/fs.js';
import { blake3Hex } from '../../utils/hash-utils.js';
import { logger } from '../../utils/logger.js';
import { buildArchiveManifest, componentEntryDir, flowEntryDir } from './archive-layout.js';

export interface ArchiveEntry {
  path: string;
  content: Buffer;
}

const ENTRY_MTIME = new Date(0);
const ENTRY_MODE = 0o644;

function jsonEntry(path: string, value: JsonValue): ArchiveEntry {
  return { path, content: Buffer.from(stringifyCanonicalJson(value), 'utf8') };
}

/**
 * Serialize entries into an uncompressed tar stream
 */
export async function packTarEntries(entries: readonly ArchiveEntry[]): Promise<Buffer> {
  const packer = tar.pack();
  const chunks: Buffer[] = [];
  const drained = (async () => {
    for await (const chunk of packer) {
      chunks.push(Buffer.from(chunk));
    }
  })();

  const sorted = [...entries].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  for (const entry of sorted) {
    packer.entry(
      {
        name: entry.path,
        size: entry.content.length,
        mode: ENTRY_MODE,
        mtime: ENTRY_MTIME,
        uid: 0,
        gid: 0,
        uname: '',
        gname: '',
        type: 'file'
      },
      entry.content
    );
  }
  packer.finalize();

  await drained;
  return Buffer.concat(chunks);
}

/**
 * Read every file entry of a gzip'd tar archive into memory
 */
export async function readPackArchive(archive: Buffer): Promise<Map<string, Buffer>> {
  const extractor = tar.extract();
  const entries = new Map<string, Buffer>();

  const finished = new Promise<void>((resolve, reject) => {
    extractor.on('entry', (header, stream, next) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        if (header.type === 'file' || header.type === undefined) {
          entries.set(header.name, Buffer.concat(chunks));
        }
        next();
      });
      stream.on('error', reject);
    });
    extractor.on('finish', () => resolve());
    extractor.on('error', reject);
  });

  extractor.end(gunzipSync(archive));
  await finished;
  return entries;
}

export class TarPackAssembler implements ArchiveAssembler {
  async assemble(request: ArchiveAssemblyRequest): Promise<ArchiveAssemblyResult> {
    try {
      const manifest = buildArchiveManifest(request);
      const manifestEntry = jsonEntry(ARCHIVE_PATHS.MANIFEST, manifest);
      const manifestHash = await blake3Hex(manifestEntry.content);

      const flowDir = flowEntryDir(request.flow.id);
      const entries: ArchiveEntry[] = [
        manifestEntry,
        { path: `${flowDir}/${ARCHIVE_PATHS.FLOW_SOURCE}`, content: Buffer.from(request.flow.source, 'utf8') },
        jsonEntry(`${flowDir}/${ARCHIVE_PATHS.FLOW_JSON}`, request.flow.canonicalJson)
      ];

      for (const component of request.components) {
        const dir = componentEntryDir(component.name, component.version);
        entries.push({
          path: `${dir}/${ARCHIVE_PATHS.COMPONENT_ARTIFACT}`,
          content: await readBinaryFile(component.artifactPath)
        });
        entries.push(jsonEntry(`${dir}/${ARCHIVE_PATHS.COMPONENT_MANIFEST}`, component.manifest));
        if (component.schema) {
          entries.push(jsonEntry(`${dir}/${ARCHIVE_PATHS.COMPONENT_SCHEMA}`, component.schema));
        }
      }

      const archive = gzipSync(await packTarEntries(entries), { level: 9 });
      await writeFileAtomic(request.outputPath, archive);

      logger.debug(`Assembled pack ${request.outputPath} (${entries.length} entries, ${archive.length} bytes)`);
      return { outPath: request.outputPath, manifestHash };
    } catch (error) {
      if (error instanceof ArchiveAssemblyFailedError) {
        throw error;
      }
      throw new ArchiveAssemblyFailedError(request.outputPath, error);
    }
  }
}
