/**
 * Schema Validator
 *
 * Validates each resolved node's configuration against its component's JSON
 * Schema. Violations are collected, never thrown: callers validate every node
 * and decide on the aggregate.
 */

import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import { Ajv2020 } from 'ajv/dist/2020.js';
import ajvFormats from 'ajv-formats';
import type { ComponentKey, ComponentLookup, JsonObject, NodeSchemaError, ResolvedNode } from '../../types/index.js';
import { toJsonValue } from '../../utils/canonical-json.js';
import { ManifestInvalidError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const DRAFT_2020_12 = 'https://json-schema.org/draft/2020-12/schema';

// ajv-formats is CommonJS; under NodeNext its default import is module.exports
const addFormats = ajvFormats.default;

function isDraft2020(schema: JsonObject): boolean {
  const declared = schema.$schema;
  return typeof declared === 'string' && declared.replace(/#$/, '') === DRAFT_2020_12;
}

/**
 * Human-readable message for one Ajv error
 */
export function describeSchemaError(error: ErrorObject): string {
  const location = error.instancePath === '' ? '(root)' : error.instancePath;
  const params = error.params;
  if (error.keyword === 'additionalProperties' && typeof params.additionalProperty === 'string') {
    return `${location} must NOT have additional property '${params.additionalProperty}'`;
  }
  return `${location} ${error.message ?? `failed ${error.keyword}`}`;
}

/**
 * One Ajv instance per component schema, so two versions of a component may
 * declare the same `$id`
 */
function compileSchema(schema: JsonObject): ValidateFunction {
  const options = { allErrors: true, strict: false };
  const ajv = isDraft2020(schema) ? new Ajv2020(options) : new Ajv(options);
  addFormats(ajv);
  return ajv.compile(schema);
}

export class SchemaValidator {
  private readonly compiled = new Map<ComponentKey, ValidateFunction | null>();

  constructor(private readonly components: ComponentLookup) {}

  /**
   * Schema violations for one node; empty when valid or when the component
   * declares no schema
   */
  validateNode(node: ResolvedNode): NodeSchemaError[] {
    const validate = this.compile(node.componentKey);
    if (!validate) {
      return [];
    }

    const component = this.components.get(node.componentKey);
    const config = toJsonValue(node.config);
    if (validate(config)) {
      return [];
    }

    return (validate.errors ?? []).map(error => ({
      nodeId: node.nodeId,
      component: component.name,
      pointer: `${node.pointer}${error.instancePath}`,
      message: describeSchemaError(error)
    }));
  }

  /**
   * Violations across all nodes, in node order
   */
  validateNodes(nodes: readonly ResolvedNode[]): NodeSchemaError[] {
    const errors = nodes.flatMap(node => this.validateNode(node));
    logger.debug(`Schema check: ${errors.length} violation(s) across ${nodes.length} node(s)`);
    return errors;
  }

  private compile(key: ComponentKey): ValidateFunction | null {
    const cached = this.compiled.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const component = this.components.get(key);
    let validate: ValidateFunction | null = null;
    if (component.schema) {
      try {
        validate = compileSchema(component.schema);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ManifestInvalidError(component.sourceDir, `config schema for ${key} did not compile: ${reason}`);
      }
    }

    this.compiled.set(key, validate);
    return validate;
  }
}
