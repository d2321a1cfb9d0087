/**
 * Read-only inventory of the credentials that exist on the target n8n
 * instance. The validator uses it to check that the credentials a node
 * references exist and have the type the node expects.
 */

import * as fs from 'fs';
import { z } from 'zod';
import type { TCredentialReference } from '../ast/types.js';
import { ConfigError, getErrorMessage } from '../utils/error-utils.js';

export type TCredentialRecord = {
  id: string;
  name: string;
  /** Credential type, e.g. `slackApi` */
  type: string;
};

const credentialFileSchema = z.union([
  z.array(z.object({ id: z.string().min(1), name: z.string(), type: z.string().min(1) })),
  z.object({
    credentials: z.array(z.object({ id: z.string().min(1), name: z.string(), type: z.string().min(1) })),
  }),
]);

export class CredentialStore {
  private readonly byId = new Map<string, TCredentialRecord>();
  private readonly byName = new Map<string, TCredentialRecord[]>();

  constructor(records: Iterable<TCredentialRecord> = []) {
    for (const record of records) {
      this.add(record);
    }
  }

  /**
   * Load from a JSON file holding either an array of records or
   * `{ "credentials": [...] }` (the shape of `n8n export:credentials` minus secrets).
   */
  static loadFromFile(filePath: string): CredentialStore {
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Cannot read credentials from ${filePath}: ${getErrorMessage(error)}`, filePath, {
        cause: error,
      });
    }
    const parsed = credentialFileSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(`Invalid credentials file ${filePath}: ${issue.message}`, filePath);
    }
    return new CredentialStore(Array.isArray(parsed.data) ? parsed.data : parsed.data.credentials);
  }

  add(record: TCredentialRecord): void {
    this.byId.set(record.id, record);
    const sameName = this.byName.get(record.name) ?? [];
    sameName.push(record);
    this.byName.set(record.name, sameName);
  }

  /**
   * Find the credential a node reference points at. An id wins over a name;
   * a name-only reference matches the first credential with that name,
   * preferring one of `expectedType` when several share the name.
   */
  find(reference: TCredentialReference, expectedType?: string): TCredentialRecord | undefined {
    if (reference.id) {
      return this.byId.get(reference.id);
    }
    if (reference.name) {
      const candidates = this.byName.get(reference.name) ?? [];
      return candidates.find((c) => c.type === expectedType) ?? candidates[0];
    }
    return undefined;
  }

  get size(): number {
    return this.byId.size;
  }
}
