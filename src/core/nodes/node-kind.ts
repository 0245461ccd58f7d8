/**
 * Node classification
 *
 * Every flow node is classified exactly once into a closed union: an
 * engine-provided built-in or an external node backed by a versioned
 * component. Later stages switch on `kind` instead of re-inspecting names.
 */

import type { NodeRef } from '../../types/index.js';
import { BUILTIN_COMPONENTS } from '../../constants/index.js';

export type BuiltInKind = 'component-exec' | 'flow-call' | 'session-wait' | 'emit';

export type ClassifiedNode =
  | { readonly kind: 'builtin'; readonly builtin: BuiltInKind; readonly ref: NodeRef }
  | { readonly kind: 'external'; readonly ref: NodeRef };

export function builtinKindOf(componentName: string): BuiltInKind | null {
  if (componentName === BUILTIN_COMPONENTS.COMPONENT_EXEC) return 'component-exec';
  if (componentName === BUILTIN_COMPONENTS.FLOW_CALL) return 'flow-call';
  if (componentName === BUILTIN_COMPONENTS.SESSION_WAIT) return 'session-wait';
  if (componentName.startsWith(BUILTIN_COMPONENTS.EMIT_PREFIX)) return 'emit';
  return null;
}

export function classifyNode(ref: NodeRef): ClassifiedNode {
  const builtin = builtinKindOf(ref.component.name);
  return builtin === null ? { kind: 'external', ref } : { kind: 'builtin', builtin, ref };
}
