import { describe, it, expect } from 'vitest';
import { Archetypes, parseBuildings, parseUnits } from '@/engine/loader/ArchetypeLoader';
import { GameError, IllegalArgumentError } from '@/engine/utils/errors';

const RAW_UNIT = {
  key: 'KNIGHT', health: 10, cost: 1, attackRange: 1, cooldown: 1, damage: 1, defense: 1,
  actionsPerTurn: 1, moveRange: 1, damageRange: 0, healAmount: 0,
  spawnableFrom: null, walkableTiles: null,
};

describe('Archetypes', () => {
  it('loads every unit and building type', () => {
    expect(Archetypes.allUnits()).toHaveLength(17);
    expect(Archetypes.allBuildings().map(b => b.key)).toEqual([
      'MAIN_CASTLE', 'PORT', 'EXPLORER_BUILDING', 'FARM_1', 'FARM_2', 'FARM_3',
    ]);
  });

  it('fills in default terrain lists', () => {
    expect(Archetypes.unit('KNIGHT').walkableTiles).toEqual(['grass', 'sand', 'bridge']);
    expect(Archetypes.building('FARM_1').placeableTiles).toEqual(['grass', 'sand']);
    expect(Archetypes.unit('SAILOR').walkableTiles).toEqual(['water', 'bridge']);
  });

  it('knows terrain move costs', () => {
    expect(Archetypes.terrain('grass').moveCost).toBe(1);
    expect(Archetypes.terrain('sand').moveCost).toBe(2);
    expect(Archetypes.terrain('mountain').moveCost).toBe(2);
  });

  it('returns undefined for unknown keys from untrusted input', () => {
    expect(Archetypes.findUnit('DRAGON')).toBeUndefined();
    expect(Archetypes.findBuilding(42)).toBeUndefined();
    expect(Archetypes.findUnit('CATAPULT')?.attackRange).toBe(10);
  });
});

describe('parsers', () => {
  it('rejects unknown unit types and terrains', () => {
    expect(() => parseUnits([{ ...RAW_UNIT, key: 'DRAGON' }])).toThrow(IllegalArgumentError);
    expect(() => parseUnits([{ ...RAW_UNIT, walkableTiles: ['lava'] }])).toThrow('KNIGHT: unknown terrain "lava"');
    expect(() => parseUnits([{ ...RAW_UNIT, spawnableFrom: ['TOWER'] }])).toThrow(IllegalArgumentError);
  });

  it('rejects unknown building types', () => {
    expect(() => parseBuildings([{
      key: 'TOWER', health: 1, cost: 1, attackRange: 0, damageRange: 0, cooldown: 0, damage: 0, defense: 0,
      actionsPerTurn: 0, spawnable: false, farm: false, placeableTiles: null,
    }])).toThrow(IllegalArgumentError);
  });

  it('builds a table of just the given entries', () => {
    const table = parseUnits([RAW_UNIT]);
    expect(table.size).toBe(1);
    expect(table.get('WARRIOR')).toBeUndefined();
  });

  it('reports parse failures as engine errors', () => {
    expect(() => parseUnits([{ ...RAW_UNIT, key: 'DRAGON' }])).toThrow(GameError);
  });
});
