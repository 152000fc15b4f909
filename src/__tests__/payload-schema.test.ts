import { describe, it, expect } from 'vitest';
import { BusError } from '../errors';
import { parsePayloadSchema, PayloadValidator } from '../nodes/payload-schema';
import { captureError } from './helpers';

describe('PayloadValidator', () => {
  const loot = new PayloadValidator({
    itemId: { type: 'string', required: true },
    count: { type: 'number', range: { min: 1, max: 99 }, default: 1 },
    rarity: { type: 'string', enum: ['Common', 'Rare'] }
  });

  it('fills in defaults and keeps undeclared fields', () => {
    expect(loot.check({ itemId: 'sword', note: 'x' })).toEqual({
      valid: true,
      payload: { itemId: 'sword', count: 1, note: 'x' }
    });
  });

  it('drops undeclared fields when sanitizing', () => {
    expect(loot.check({ itemId: 'sword', note: 'x' }, true)).toEqual({
      valid: true,
      payload: { itemId: 'sword', count: 1 }
    });
  });

  it('names every failing field', () => {
    expect(loot.check({ count: 120, rarity: 'Mythic' })).toEqual({
      valid: false,
      issues: [
        { field: 'itemId', message: "Field 'itemId' is required" },
        { field: 'count', message: "Field 'count' is above maximum 99" },
        { field: 'rarity', message: "Field 'rarity' must be one of: Common, Rare" }
      ]
    });
  });

  it('requires a value for a required field of any type', () => {
    const validator = new PayloadValidator({ entity: { type: 'any', required: true } });

    expect(validator.check({ entity: 0 })).toEqual({ valid: true, payload: { entity: 0 } });
    expect(validator.check({})).toEqual({
      valid: false,
      issues: [{ field: 'entity', message: "Field 'entity' is required" }]
    });
  });

  it('runs custom validators on present values', () => {
    const validator = new PayloadValidator({
      name: { type: 'string', validator: value => value !== 'admin' || 'name is reserved' },
      level: { type: 'number', validator: value => value !== 0 }
    });

    expect(validator.check({}).valid).toBe(true);
    expect(validator.check({ name: 'admin', level: 0 })).toEqual({
      valid: false,
      issues: [
        { field: 'name', message: 'name is reserved' },
        { field: 'level', message: "Field 'level' failed custom validation" }
      ]
    });
  });
});

describe('parsePayloadSchema()', () => {
  it('accepts a well-formed schema', () => {
    const schema = { n: { type: 'number', required: true } };

    expect(parsePayloadSchema('Spawned', schema)).toEqual(schema);
  });

  it('rejects unknown options as an invalid definition', () => {
    const error = captureError(() => parsePayloadSchema('Spawned', { n: { type: 'number', requird: true } }));

    expect(error).toBeInstanceOf(BusError);
    expect(error instanceof BusError ? error.code : undefined).toBe('INVALID_DEFINITION');
    expect(error instanceof Error ? error.message : '').toMatch(/^Schema 'Spawned': n: Unrecognized key/);
  });

  it('rejects a range on a non-number field', () => {
    expect(() => parsePayloadSchema('S', { tag: { type: 'string', range: { min: 1 } } })).toThrow(
      "Schema 'S': tag.range: range needs type 'number'"
    );
  });
});
