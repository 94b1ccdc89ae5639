import path from 'node:path';

import type { SecretsId } from './models/secrets-id.js';

/**
 * Path of a project's secrets directory: `<root>/<identifier>`.
 *
 * Pure. Distinct identifiers map to distinct directories because the
 * identifier text is the leaf name verbatim.
 */
export function resolveSecretsDir(root: string, id: SecretsId): string {
  return path.join(root, id.asStr());
}
