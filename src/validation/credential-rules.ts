import type { TNode, TValidationError } from '../ast/types.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { matchesDisplayOptions, type TVisibilityContext } from '../registry/display-options.js';
import type { TNodeTypeSchema } from '../registry/types.js';
import { didYouMean } from '../utils/string-distance.js';

function describeReference(reference: { id?: string; name?: string }): string {
  if (reference.id && reference.name) return `"${reference.name}" (id ${reference.id})`;
  if (reference.id) return `with id ${reference.id}`;
  if (reference.name) return `"${reference.name}"`;
  return 'without id or name';
}

/**
 * Credential checks for one node.
 *
 * Schema checks (missing / unexpected credential types) always run.
 * Existence and type checks run only when an inventory is supplied.
 */
export function checkNodeCredentials(
  node: TNode,
  schema: TNodeTypeSchema,
  store?: CredentialStore
): TValidationError[] {
  const diagnostics: TValidationError[] = [];
  const configured = node.credentials ?? {};
  const declared = schema.credentials ?? [];
  const ctx: TVisibilityContext = { schema, parameters: node.parameters, typeVersion: node.typeVersion };

  for (const requirement of declared) {
    if (!requirement.required || !matchesDisplayOptions(requirement.displayOptions, ctx)) continue;
    if (!configured[requirement.name]) {
      diagnostics.push({
        type: 'error',
        code: 'MISSING_CREDENTIALS',
        message: `Node "${node.name}" needs credentials of type "${requirement.name}"`,
        node: node.name,
        property: `credentials.${requirement.name}`,
      });
    }
  }

  // HTTP Request with predefined credentials names the credential type in a parameter
  const predefinedType = node.parameters.nodeCredentialType;
  const declaredNames = new Set(declared.map((c) => c.name));

  for (const [credentialType, reference] of Object.entries(configured)) {
    if (!declaredNames.has(credentialType) && credentialType !== predefinedType) {
      diagnostics.push({
        type: 'error',
        code: 'UNEXPECTED_CREDENTIAL_TYPE',
        message: `Node "${node.name}" sets credentials of type "${credentialType}", which "${schema.type}" does not use.${didYouMean(credentialType, declaredNames)}`,
        node: node.name,
        property: `credentials.${credentialType}`,
      });
      continue;
    }

    if (!store) continue;

    const record = store.find(reference, credentialType);
    if (!record) {
      diagnostics.push({
        type: 'error',
        code: 'CREDENTIAL_NOT_FOUND',
        message: `Node "${node.name}" references credential ${describeReference(reference)} of type "${credentialType}", which does not exist`,
        node: node.name,
        property: `credentials.${credentialType}`,
      });
    } else if (record.type !== credentialType) {
      diagnostics.push({
        type: 'error',
        code: 'CREDENTIAL_TYPE_MISMATCH',
        message: `Node "${node.name}" uses credential "${record.name}" as "${credentialType}", but its type is "${record.type}"`,
        node: node.name,
        property: `credentials.${credentialType}`,
      });
    }
  }

  return diagnostics;
}
