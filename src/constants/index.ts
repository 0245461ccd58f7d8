/**
 * Shared constants for flowpack
 * Single source of truth for directory names, file names and defaults.
 */

export const DIR_PATTERNS = {
  FLOWPACK: '.flowpack',
  RESOLVED_CONFIG: 'resolved_config',
  COMPONENTS: 'components'
} as const;

export const FILE_PATTERNS = {
  COMPONENT_MANIFEST: 'component.manifest.json',
  DEFAULT_COMPONENT_ARTIFACT: 'component.wasm',
  ARCHIVE_EXTENSION: '.fpack'
} as const;

/**
 * Entry names inside a pack archive
 */
export const ARCHIVE_PATHS = {
  MANIFEST: 'manifest.json',
  FLOWS_DIR: 'flows',
  COMPONENTS_DIR: 'components',
  FLOW_SOURCE: 'flow.ygtc',
  FLOW_JSON: 'flow.json',
  COMPONENT_ARTIFACT: 'component.wasm',
  COMPONENT_MANIFEST: 'manifest.json',
  COMPONENT_SCHEMA: 'schema.json'
} as const;

export const PACK_DEFAULTS = {
  FORMAT_VERSION: 1,
  VERSION: '0.1.0',
  PACK_ID_PREFIX: 'dev.local.'
} as const;

/**
 * Engine-provided node kinds. `component.exec` wraps an ordinary component
 * reference; the others never resolve to a component.
 */
export const BUILTIN_COMPONENTS = {
  COMPONENT_EXEC: 'component.exec',
  FLOW_CALL: 'flow.call',
  SESSION_WAIT: 'session.wait',
  EMIT_PREFIX: 'emit'
} as const;

/** Keys of a flow node entry that never name a component */
export const RESERVED_NODE_KEYS = ['routing', 'version', 'schema_id', 'title', 'description'] as const;

export const OPERATION_KEYS = {
  CURRENT: 'operation',
  LEGACY: 'op'
} as const;

export const HASH_SCHEME = 'blake3';

export const ENV_VARS = {
  VERBOSE: 'FLOWPACK_VERBOSE',
  STRICT: 'FLOWPACK_STRICT',
  LEGACY_STRICT: 'LOCAL_CHECK_STRICT',
  SOURCE_DATE_EPOCH: 'SOURCE_DATE_EPOCH',
  HOSTNAME: 'HOSTNAME'
} as const;
