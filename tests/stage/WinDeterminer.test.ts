import { describe, it, expect } from 'vitest';
import { determineWinner } from '@/engine/systems/stage/WinDeterminer';
import { EntityRegistry } from '@/engine/systems/registry/EntityRegistry';
import { buildStore, putUnit } from '../integration/helpers';

describe('determineWinner', () => {
  it('gives an exact tie to the second mover', () => {
    const store = buildStore();
    expect(determineWinner(store.getState())).toEqual({ winner: 'RED', rule: 'second_mover' });
  });

  it('awards the side whose home base still stands', () => {
    const store = buildStore();
    store.apply(draft => { EntityRegistry.remove(draft, 1, 'combat'); });
    expect(determineWinner(store.getState())).toEqual({ winner: 'BLUE', rule: 'home_base_destroyed' });
  });

  it('compares home-base health next', () => {
    const store = buildStore();
    store.apply(draft => {
      const castle = draft.buildings.BLUE[0];
      if (castle) castle.health = 20;
      draft.balance.BLUE = 500;
    });
    expect(determineWinner(store.getState())).toEqual({ winner: 'RED', rule: 'home_base_health' });
  });

  it('then compares economic value', () => {
    const store = buildStore();
    putUnit(store, 'BLUE', 'SWORDSMAN', 2, 2);
    expect(determineWinner(store.getState())).toEqual({ winner: 'BLUE', rule: 'economic_value' });
  });

  it('with both bases gone, skips straight to economic value', () => {
    const store = buildStore();
    store.apply(draft => {
      EntityRegistry.remove(draft, 0, 'combat');
      EntityRegistry.remove(draft, 1, 'combat');
    });
    expect(determineWinner(store.getState())).toEqual({ winner: 'RED', rule: 'second_mover' });

    store.apply(draft => { draft.balance.BLUE = 12; });
    expect(determineWinner(store.getState())).toEqual({ winner: 'BLUE', rule: 'economic_value' });
  });
});
