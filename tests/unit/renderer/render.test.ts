import { describe, it, expect } from 'vitest';
import {
  render,
  isRenderTarget,
  reservedStructNames,
  type RenderOptions,
} from '../../../src/lib/renderer/index.js';
import { collect } from '../../../src/lib/collector/index.js';
import { synthesize } from '../../../src/lib/synthesizer/index.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('render', () => {
  const empty = synthesize(undefined);

  it('should default to TypeScript with the RootType alias', () => {
    expect(render(empty)).toBe('export type RootType = unknown[];\n');
  });

  it('should dispatch on the target', () => {
    expect(render(empty, { target: 'python', rootTypeName: 'Rows' })).toBe(
      'import typing as t\n\nRows = list[t.Any]\n',
    );
  });

  it('should reject an alias name that is not an identifier', () => {
    expect(() => render(empty, { rootTypeName: 'root-type' })).toThrow(ConfigError);
  });

  it('should reject an alias the target already declares', () => {
    expect(() => render(empty, { rootTypeName: 'Record' })).toThrow(
      'rootTypeName "Record" is reserved in typescript output',
    );
    expect(() => render(empty, { target: 'python', rootTypeName: 'class' })).toThrow(ConfigError);
    expect(() => render(empty, { target: 'python', rootTypeName: 't' })).toThrow(ConfigError);
  });

  it('should reject a struct declared under the alias name', () => {
    const result = synthesize(collect([[{ a: 1 }]]), { rootStructName: 'RootType' });

    expect(() => render(result)).toThrow(
      'Struct $[] would be declared as "RootType", which typescript output already uses',
    );
    expect(render(result, { target: 'python' })).toContain('class RootTypeDict(t.TypedDict):\n');
  });

  it('should reject a struct declared under a reserved name', () => {
    const result = synthesize(collect([[{ record: { a: 1 } }]]));

    expect(() => render(result)).toThrow(ConfigError);
  });

  it('should reject an unknown target read from untyped input', () => {
    const options: Partial<RenderOptions> = JSON.parse('{"target":"rust"}');

    expect(() => render(empty, options)).toThrow('Unsupported target "rust". Must be one of: typescript, python');
  });
});

describe('reservedStructNames', () => {
  it('should reserve the alias and the global names TypeScript output uses', () => {
    const names = reservedStructNames();

    expect(names[0]).toBe('RootType');
    expect(names).toContain('Record');
    expect(names).toContain('string');
  });

  it('should reserve the struct a Python alias would collide with', () => {
    expect(reservedStructNames({ target: 'python', rootTypeName: 'RootDict' })).toEqual(['Root']);
    expect(reservedStructNames({ target: 'python' })).toEqual([]);
  });
});

describe('isRenderTarget', () => {
  it('should accept supported targets only', () => {
    expect(isRenderTarget('typescript')).toBe(true);
    expect(isRenderTarget('python')).toBe(true);
    expect(isRenderTarget('rust')).toBe(false);
  });
});
