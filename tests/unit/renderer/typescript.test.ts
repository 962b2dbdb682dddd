/**
 * Unit tests for the TypeScript renderer
 */

import { describe, it, expect } from 'vitest';
import { renderTypeScript, renderTypeScriptType } from '../../../src/lib/renderer/typescript.js';
import type { StructType, SynthesisResult, TypeDefinition } from '../../../src/lib/synthesizer/types.js';

const NULL: TypeDefinition = { kind: 'scalar', scalar: 'null' };

function result(structs: StructType[], element: TypeDefinition): SynthesisResult {
  return {
    root: { kind: 'list', element },
    structs,
    metadata: { structCount: structs.length, fieldsProcessed: 0, literalSlots: 0 },
  };
}

describe('renderTypeScriptType', () => {
  it('should render both number kinds as number', () => {
    expect(renderTypeScriptType({ kind: 'scalar', scalar: 'integer' })).toBe('number');
    expect(renderTypeScriptType({ kind: 'scalar', scalar: 'float' })).toBe('number');
  });

  it('should render literals as quoted unions', () => {
    expect(renderTypeScriptType({ kind: 'literal', scalar: 'string', values: ['a', 'say "hi"'] })).toBe(
      '"a" | "say \\"hi\\""',
    );
    expect(renderTypeScriptType({ kind: 'literal', scalar: 'boolean', values: [false, true] })).toBe(
      'false | true',
    );
  });

  it('should put null last in unions', () => {
    expect(
      renderTypeScriptType({ kind: 'union', members: [NULL, { kind: 'scalar', scalar: 'string' }] }),
    ).toBe('string | null');
  });

  it('should parenthesize union and multi-value literal elements of lists', () => {
    expect(
      renderTypeScriptType({
        kind: 'list',
        element: { kind: 'union', members: [NULL, { kind: 'literal', scalar: 'string', values: ['a'] }] },
      }),
    ).toBe('("a" | null)[]');
    expect(
      renderTypeScriptType({ kind: 'list', element: { kind: 'literal', scalar: 'string', values: ['a', 'b'] } }),
    ).toBe('("a" | "b")[]');
    expect(
      renderTypeScriptType({ kind: 'list', element: { kind: 'literal', scalar: 'string', values: ['a'] } }),
    ).toBe('"a"[]');
  });

  it('should render unknown, dictionaries and nested lists', () => {
    expect(renderTypeScriptType({ kind: 'list', element: { kind: 'scalar', scalar: 'unknown' } })).toBe(
      'unknown[]',
    );
    expect(renderTypeScriptType({ kind: 'dictionary' })).toBe('Record<string, unknown>');
    expect(
      renderTypeScriptType({ kind: 'list', element: { kind: 'list', element: { kind: 'scalar', scalar: 'boolean' } } }),
    ).toBe('boolean[][]');
  });
});

describe('renderTypeScript', () => {
  it('should emit one interface per struct and the corpus alias', () => {
    const address: StructType = {
      kind: 'struct',
      name: 'Address',
      path: '$[].address',
      fields: [{ name: 'city', type: { kind: 'scalar', scalar: 'string' }, optional: false }],
    };
    const root: StructType = {
      kind: 'struct',
      name: 'Root',
      path: '$[]',
      fields: [
        { name: 'address', type: address, optional: true },
        { name: 'first name', type: { kind: 'scalar', scalar: 'string' }, optional: false },
      ],
    };

    expect(renderTypeScript(result([address, root], root), 'Rows')).toBe(
      [
        'export interface Address {',
        '  city: string;',
        '}',
        '',
        'export interface Root {',
        '  address?: Address;',
        '  "first name": string;',
        '}',
        '',
        'export type Rows = Root[];',
        '',
      ].join('\n'),
    );
  });

  it('should emit only the alias when there are no structs', () => {
    expect(renderTypeScript(result([], { kind: 'scalar', scalar: 'unknown' }), 'RootType')).toBe(
      'export type RootType = unknown[];\n',
    );
  });
});
