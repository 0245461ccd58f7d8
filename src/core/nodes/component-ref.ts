import { InvalidComponentRefError } from '../../utils/errors.js';
import { ANY_VERSION, isValidVersionRequirement } from '../../utils/version-requirements.js';

export interface ParsedComponentRef {
  name: string;
  versionReq: string;
}

/**
 * Parse `name` or `name@requirement`. A leading `@` belongs to a scoped name.
 */
export function parseComponentRef(raw: string): ParsedComponentRef {
  const trimmed = raw.trim();
  const at = trimmed.indexOf('@', 1);
  const name = (at === -1 ? trimmed : trimmed.slice(0, at)).trim();
  const versionReq = at === -1 ? ANY_VERSION : trimmed.slice(at + 1).trim();

  if (name === '') {
    throw new InvalidComponentRefError(raw, 'component name is empty');
  }
  if (!isValidVersionRequirement(versionReq)) {
    throw new InvalidComponentRefError(raw, `invalid version requirement '${versionReq}'`);
  }
  return { name, versionReq: versionReq === '' ? ANY_VERSION : versionReq };
}
