/**
 * Unit tests for type synthesis
 */

import { describe, it, expect } from 'vitest';
import { collect } from '../../../src/lib/collector/index.js';
import {
  Synthesizer,
  synthesize,
  validateSynthesizerOptions,
  type StructType,
  type SynthesizerOptions,
  type TypeDefinition,
} from '../../../src/lib/synthesizer/index.js';
import type { JsonValue } from '../../../src/types/json.js';
import { ConfigError } from '../../../src/utils/errors.js';

function synthesizeRecords(records: JsonValue[], options: Partial<SynthesizerOptions> = {}) {
  return synthesize(collect([records]), options);
}

function rootStruct(records: JsonValue[], options: Partial<SynthesizerOptions> = {}): StructType {
  const { root } = synthesizeRecords(records, options);
  if (root.element.kind !== 'struct') {
    throw new Error(`expected a struct, got ${root.element.kind}`);
  }
  return root.element;
}

function fieldType(struct: StructType, name: string): TypeDefinition | undefined {
  return struct.fields.find((field) => field.name === name)?.type;
}

describe('synthesize', () => {
  describe('literal collapse', () => {
    it('should collapse a string slot with exactly threshold distinct values', () => {
      const struct = rootStruct([{ s: 'c' }, { s: 'a' }, { s: 'b' }, { s: 'a' }], { literalThreshold: 3 });

      expect(fieldType(struct, 's')).toEqual({ kind: 'literal', scalar: 'string', values: ['a', 'b', 'c'] });
    });

    it('should keep the scalar type one value past the threshold', () => {
      const struct = rootStruct([{ s: 'a' }, { s: 'b' }, { s: 'c' }, { s: 'd' }], { literalThreshold: 3 });

      expect(fieldType(struct, 's')).toEqual({ kind: 'scalar', scalar: 'string' });
    });

    it('should collapse booleans with false before true', () => {
      const struct = rootStruct([{ flag: true }, { flag: false }]);

      expect(fieldType(struct, 'flag')).toEqual({ kind: 'literal', scalar: 'boolean', values: [false, true] });
    });

    it('should keep boolean when both values exceed the threshold', () => {
      const struct = rootStruct([{ flag: true }, { flag: false }], { literalThreshold: 1 });

      expect(fieldType(struct, 'flag')).toEqual({ kind: 'scalar', scalar: 'boolean' });
    });

    it('should never collapse numbers', () => {
      const struct = rootStruct([{ n: 7 }, { n: 7 }, { x: 1.5 }]);

      expect(fieldType(struct, 'n')).toEqual({ kind: 'scalar', scalar: 'integer' });
      expect(fieldType(struct, 'x')).toEqual({ kind: 'scalar', scalar: 'float' });
    });

    it('should disable collapse with a zero threshold', () => {
      const struct = rootStruct([{ s: 'only' }], { literalThreshold: 0 });

      expect(fieldType(struct, 's')).toEqual({ kind: 'scalar', scalar: 'string' });
    });

    it('should order string literals by code unit', () => {
      const struct = rootStruct([{ s: 'b' }, { s: 'B' }, { s: 'a' }, { s: '_' }]);

      expect(fieldType(struct, 's')).toEqual({ kind: 'literal', scalar: 'string', values: ['B', '_', 'a', 'b'] });
    });
  });

  describe('optional fields', () => {
    it('should mark fields missing from some records as optional', () => {
      const struct = rootStruct([{ a: 1, b: 'x' }, { a: 2 }]);

      expect(struct.fields.map((field) => [field.name, field.optional])).toEqual([
        ['a', false],
        ['b', true],
      ]);
    });

    it('should keep every field required when disabled', () => {
      const struct = rootStruct([{ a: 1, b: 'x' }, { a: 2 }], { optionalFields: false });

      expect(struct.fields.every((field) => !field.optional)).toBe(true);
    });
  });

  describe('structs', () => {
    it('should name nested structs from their field path and list dependencies first', () => {
      const result = synthesizeRecords([
        { id: 1, user: { name: 'ada', address: { city: 'Paris' } } },
      ]);

      expect(result.structs.map((struct) => [struct.name, struct.path])).toEqual([
        ['UserAddress', '$[].user.address'],
        ['User', '$[].user'],
        ['Root', '$[]'],
      ]);
      expect(result.metadata).toEqual({ structCount: 3, fieldsProcessed: 5, literalSlots: 2 });
    });

    it('should skip array segments when naming element structs', () => {
      const result = synthesizeRecords([{ line_items: [{ sku: 'x' }, { sku: 'y', qty: 2 }] }]);
      const items = result.structs[0];

      expect(items?.name).toBe('LineItems');
      expect(items?.path).toBe('$[].line_items[]');
      expect(items?.fields.map((field) => [field.name, field.optional])).toEqual([
        ['sku', false],
        ['qty', true],
      ]);
    });

    it('should suffix colliding names in claim order', () => {
      const result = synthesizeRecords([{ a_b: { x: 1 }, a: { b: { y: 1 } } }]);

      expect(result.structs.map((struct) => struct.name)).toEqual(['AB', 'AB2', 'A', 'Root']);
    });

    it('should give the record struct precedence over a nested "root" field', () => {
      const result = synthesizeRecords([{ root: { x: 1 } }]);

      expect(result.structs.map((struct) => struct.name)).toEqual(['Root2', 'Root']);
    });

    it('should suffix struct names that are reserved', () => {
      const result = synthesizeRecords([{ record: { a: 1 } }], { reservedNames: ['Record', 'Root'] });

      expect(result.structs.map((struct) => struct.name)).toEqual(['Record2', 'Root2']);
    });

    it('should use the configured record struct name', () => {
      expect(rootStruct([{ a: 1 }], { rootStructName: 'Event' }).name).toBe('Event');
    });

    it('should reuse one struct for every element of a list', () => {
      const result = synthesizeRecords([{ tags: [{ k: 'a' }] }, { tags: [{ k: 'b' }, { k: 'c' }] }]);

      expect(result.structs).toHaveLength(2);
      expect(result.root.element.kind === 'struct' && result.root.element.fields[0]?.type).toEqual({
        kind: 'list',
        element: result.structs[0],
      });
    });
  });

  describe('degenerate slots', () => {
    it('should map an object that never carried a field to a dictionary', () => {
      expect(fieldType(rootStruct([{ meta: {} }]), 'meta')).toEqual({ kind: 'dictionary' });
    });

    it('should map an always-empty array to a list of unknown', () => {
      expect(fieldType(rootStruct([{ xs: [] }]), 'xs')).toEqual({
        kind: 'list',
        element: { kind: 'scalar', scalar: 'unknown' },
      });
    });

    it('should map an always-null slot to null', () => {
      expect(fieldType(rootStruct([{ gone: null }, { gone: null }]), 'gone')).toEqual({
        kind: 'scalar',
        scalar: 'null',
      });
    });

    it('should keep union members in kind order', () => {
      expect(fieldType(rootStruct([{ v: 'x' }, { v: 1 }, { v: null }]), 'v')).toEqual({
        kind: 'union',
        members: [
          { kind: 'scalar', scalar: 'null' },
          { kind: 'scalar', scalar: 'integer' },
          { kind: 'literal', scalar: 'string', values: ['x'] },
        ],
      });
    });

    it('should give a list of unknown when no record was seen', () => {
      expect(synthesize(undefined)).toEqual({
        root: { kind: 'list', element: { kind: 'scalar', scalar: 'unknown' } },
        structs: [],
        metadata: { structCount: 0, fieldsProcessed: 0, literalSlots: 0 },
      });
    });

    it('should type records that are not objects directly', () => {
      expect(synthesize(collect([[1, 2.5]])).root).toEqual({
        kind: 'list',
        element: { kind: 'scalar', scalar: 'float' },
      });
    });
  });

  describe('options', () => {
    it('should reject a negative or fractional threshold', () => {
      expect(() => synthesize(undefined, { literalThreshold: -1 })).toThrow(ConfigError);
      expect(() => synthesize(undefined, { literalThreshold: 1.5 })).toThrow(
        'literalThreshold must be a non-negative integer, got 1.5',
      );
    });

    it('should reject a record struct name that is not an identifier', () => {
      expect(() =>
        validateSynthesizerOptions({ literalThreshold: 9, optionalFields: true, rootStructName: 'My Row' }),
      ).toThrow(ConfigError);
    });

    it('should apply constructor options through the Synthesizer class', () => {
      const synthesizer = new Synthesizer({ literalThreshold: 0 });
      const { root } = synthesizer.synthesize(collect([[{ s: 'a' }]]));

      expect(root.element.kind === 'struct' && root.element.fields[0]?.type).toEqual({
        kind: 'scalar',
        scalar: 'string',
      });
    });
  });
});
