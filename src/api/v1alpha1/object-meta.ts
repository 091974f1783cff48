import { type } from 'arktype';

export const OwnerReferenceSchema = type({
  apiVersion: 'string',
  kind: 'string',
  name: 'string',
  uid: 'string',
  'controller?': 'boolean',
  'blockOwnerDeletion?': 'boolean',
});

/**
 * The subset of metav1.ObjectMeta the operator reads. Undeclared keys are kept
 * as they are, so an object read and written back loses nothing.
 */
export const ObjectMetaSchema = type({
  name: 'string',
  'namespace?': 'string',
  'uid?': 'string',
  'resourceVersion?': 'string',
  'generation?': 'number',
  'labels?': 'Record<string, string>',
  'annotations?': 'Record<string, string>',
  'finalizers?': 'string[]',
  'deletionTimestamp?': 'string',
  'ownerReferences?': OwnerReferenceSchema.array(),
});

export type ObjectMeta = typeof ObjectMetaSchema.infer;
export type OwnerReference = typeof OwnerReferenceSchema.infer;

/**
 * Best-effort name of an unvalidated object, for error messages
 */
export function resourceName(resource: unknown): string {
  if (typeof resource === 'object' && resource !== null && 'metadata' in resource) {
    const { metadata } = resource;
    if (typeof metadata === 'object' && metadata !== null && 'name' in metadata) {
      return String(metadata.name);
    }
  }
  return 'unnamed';
}
