/**
 * Shared type descriptions for the avro-names test suite.
 */

import { buildTypeFullname } from '../../../src/lib/names.js';
import type {
  PrimitiveType,
  PrimitiveTypeName,
  FixedType,
  RecordType,
} from '../../../src/types/type-description.js';

export function primitive(name: PrimitiveTypeName): PrimitiveType {
  return { kind: 'primitive', name };
}

/** Fixed type with its fullname already resolved (no enclosing namespace). */
export function fixedType(name: string, namespace: string): FixedType {
  return {
    kind: 'fixed',
    name,
    namespace,
    size: 16,
    fullname: buildTypeFullname(name, namespace, ''),
  };
}

/**
 * Unresolved tree exercising namespace inheritance:
 *
 *   a.b.Outer
 *     inner:  enum Inner          (inherits a.b)
 *     hashes: array<fixed c.Hash> (explicit namespace)
 *     other:  union [null, record x.y.Deep { leaf: fixed Leaf }]
 */
export const NESTED_RECORD: RecordType = {
  kind: 'record',
  name: 'Outer',
  namespace: 'a.b',
  fullname: '',
  fields: [
    {
      name: 'inner',
      type: { kind: 'enum', name: 'Inner', namespace: '', fullname: '', symbols: ['ON', 'OFF'] },
    },
    {
      name: 'hashes',
      type: {
        kind: 'array',
        items: { kind: 'fixed', name: 'Hash', namespace: 'c', fullname: '', size: 32 },
      },
    },
    {
      name: 'other',
      doc: 'Optional nested record',
      type: {
        kind: 'union',
        types: [
          primitive('null'),
          {
            kind: 'record',
            name: 'x.y.Deep',
            namespace: 'ignored',
            fullname: '',
            fields: [
              {
                name: 'leaf',
                type: { kind: 'fixed', name: 'Leaf', namespace: '', fullname: '', size: 4 },
              },
            ],
          },
        ],
      },
    },
  ],
};
