import { describe, expect, it } from 'vitest';

import { PLACEHOLDER } from '../../types';
import { bindingKey, emitOverrides } from '../override-emitter';

describe('Override Emitter', () => {
  it('emits one binding per value in field order', () => {
    const bindings = emitOverrides('Model', 'units', [
      { field: 'b', value: 'm' },
      { field: 'a', value: 'kg' }
    ]);

    expect(bindings).toEqual([
      { kind: 'units', type: 'Model', field: 'b', value: 'm' },
      { kind: 'units', type: 'Model', field: 'a', value: 'kg' }
    ]);
  });

  it('drops placeholders', () => {
    const bindings = emitOverrides('Model', 'units', [
      { field: 'a', value: PLACEHOLDER },
      { field: 'b', value: undefined }
    ]);

    // `undefined` is a value; only the placeholder keeps the default.
    expect(bindings).toEqual([
      { kind: 'units', type: 'Model', field: 'b', value: undefined }
    ]);
  });

  it('freezes container values', () => {
    const [binding] = emitOverrides('Model', 'bounds', [
      { field: 'a', value: { range: [0, 1] } }
    ]);

    expect(binding?.value).toEqual({ range: [0, 1] });
    expect(Object.isFrozen(binding?.value)).toBe(true);
  });

  it('builds keys that keep separators apart', () => {
    expect(bindingKey('a.b', 'c', 'd')).toBe('["a.b","c","d"]');
    expect(bindingKey('a', 'b.c', 'd')).not.toBe(bindingKey('a.b', 'c', 'd'));
  });
});
