import { hostname } from 'os';
import { resolve } from 'path';
import { Command, Option } from 'commander';

import { ENV_VARS } from '../constants/index.js';
import type { PackBuildConfig, PackSigning } from '../types/index.js';
import { displayPackBuildSummary, displayPackInspection } from '../core/pack/pack-output.js';
import { inspectPack } from '../core/pack/pack-inspect.js';
import { runPackBuildPipeline } from '../core/pack/pack-pipeline.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface PackBuildCommandOptions {
  flow: string;
  out: string;
  sign: string;
  meta?: string;
  componentDir?: string;
  diagnosticsDir?: string;
  strict?: boolean;
}

interface PackInspectCommandOptions {
  json?: boolean;
}

type Environment = Record<string, string | undefined>;

const TRUTHY_ENV_VALUES: ReadonlySet<string> = new Set(['1', 'true', 'TRUE']);

function parseSigning(value: string): PackSigning {
  if (value === 'dev' || value === 'none') {
    return value;
  }
  throw new Error(`Unsupported signing mode '${value}' (expected 'dev' or 'none')`);
}

function envFlag(env: Environment, name: string): boolean {
  const value = env[name];
  return value !== undefined && TRUTHY_ENV_VALUES.has(value);
}

/**
 * `SOURCE_DATE_EPOCH` (seconds since the epoch) pins the build timestamp
 */
function buildTimeFromEnv(env: Environment): Date | undefined {
  const raw = env[ENV_VARS.SOURCE_DATE_EPOCH];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const seconds = Number(raw);
  if (!Number.isInteger(seconds) || seconds < 0) {
    logger.warn(`Ignoring ${ENV_VARS.SOURCE_DATE_EPOCH}=${raw}: expected a non-negative integer`);
    return undefined;
  }
  return new Date(seconds * 1000);
}

/**
 * Map command-line options and environment to a build configuration.
 * This is the only place the pack build consults the environment.
 */
export function packBuildConfigFromOptions(
  options: PackBuildCommandOptions,
  workspaceRoot: string,
  env: Environment = process.env
): PackBuildConfig {
  return {
    workspaceRoot,
    flowPath: options.flow,
    outputPath: options.out,
    signing: parseSigning(options.sign),
    metaPath: options.meta,
    componentDir: options.componentDir,
    diagnosticsDir: options.diagnosticsDir,
    strictDeterminism:
      options.strict === true || envFlag(env, ENV_VARS.STRICT) || envFlag(env, ENV_VARS.LEGACY_STRICT),
    buildTime: buildTimeFromEnv(env),
    host: env[ENV_VARS.HOSTNAME] ?? hostname()
  };
}

function workspaceRootOf(command: Command): string {
  const cwd: unknown = command.optsWithGlobals().cwd;
  return typeof cwd === 'string' ? resolve(process.cwd(), cwd) : process.cwd();
}

export function setupPackCommand(program: Command): void {
  const pack = program
    .command('pack')
    .description('Build and inspect flow packs');

  pack
    .command('build')
    .description(
      'Validate a flow, resolve its components and write a .fpack archive.\n' +
      'Usage:\n' +
      '  flowpack pack build --flow flows/hello.ygtc --out dist/hello.fpack\n' +
      '  flowpack pack build --flow flows/hello.ygtc --out dist/hello.fpack --strict'
    )
    .requiredOption('--flow <file>', 'flow document to pack')
    .requiredOption('--out <file>', 'archive path to write')
    .addOption(new Option('--sign <mode>', 'signing mode').choices(['dev', 'none']).default('dev'))
    .option('--meta <file>', 'pack metadata descriptor (TOML)')
    .option('--component-dir <dir>', 'directory to search for components')
    .option('--diagnostics-dir <dir>', 'directory for resolved-config snapshots')
    .option('--strict', 'rebuild and byte-compare the archive before accepting it')
    .action(withErrorHandling(async (options: PackBuildCommandOptions, command: Command) => {
      const workspaceRoot = workspaceRootOf(command);
      const config = packBuildConfigFromOptions(options, workspaceRoot);
      const result = await runPackBuildPipeline(config, { output: consoleOutput });
      if (!result.success || !result.data) {
        throw new Error(result.error || 'Pack build failed');
      }
      displayPackBuildSummary(result.data, consoleOutput, workspaceRoot);
    }));

  pack
    .command('inspect')
    .argument('<archive>', 'pack archive to read')
    .description('List the contents of a pack and verify its hashes')
    .option('--json', 'print the archive manifest and report as JSON')
    .action(withErrorHandling(async (archive: string, options: PackInspectCommandOptions, command: Command) => {
      const workspaceRoot = workspaceRootOf(command);
      const inspection = await inspectPack(resolve(workspaceRoot, archive));

      if (options.json) {
        console.log(JSON.stringify(inspection, null, 2));
      } else {
        displayPackInspection(inspection, consoleOutput, workspaceRoot);
      }

      if (inspection.problems.length > 0) {
        throw new Error(`Pack ${archive} failed verification (${inspection.problems.length} problem(s))`);
      }
    }));
}
