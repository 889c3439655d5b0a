import { describe, it, expect } from 'vitest';

import { hasDestructorName, isFactoryWord, safeIdentifier, splitWords, stripOwner, toCamel, toPascal, toSnake } from './naming.js';

describe('naming', () => {
  it('splits snake, camel and acronym case', () => {
    expect(splitWords('calculator_get_value')).toEqual(['calculator', 'get', 'value']);
    expect(splitWords('getValue')).toEqual(['get', 'value']);
    expect(splitWords('HTTPServer')).toEqual(['http', 'server']);
  });

  it('converts between cases', () => {
    expect(toSnake('getValue')).toBe('get_value');
    expect(toCamel('set_value')).toBe('setValue');
    expect(toPascal('ring_buffer')).toBe('RingBuffer');
  });

  it('strips the owner prefix from member names', () => {
    expect(stripOwner('calculator_get_value', 'Calculator')).toBe('get_value');
    expect(stripOwner('point_distance', 'Point')).toBe('distance');
    expect(stripOwner('reset_calculator', 'Calculator')).toBe('reset');
    expect(stripOwner('calculator', 'Calculator')).toBeNull();
    expect(stripOwner('add', 'Point')).toBe('add');
  });

  it('recognises lifetime words', () => {
    expect(hasDestructorName('calculator_delete')).toBe(true);
    expect(hasDestructorName('buffer_close')).toBe(true);
    expect(hasDestructorName('calculator_get_value')).toBe(false);
    expect(isFactoryWord('new')).toBe(true);
    expect(isFactoryWord('get')).toBe(false);
  });

  it('suffixes reserved identifiers', () => {
    const reserved = new Set(['type']);
    expect(safeIdentifier('type', reserved)).toBe('type_');
    expect(safeIdentifier('kind', reserved)).toBe('kind');
  });
});
