import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { TurnPhase } from '@/engine/systems/turn/TurnManager';
import { TurnManager } from '@/engine/systems/turn/TurnManager';
import { EventBus } from '@/engine/utils/EventBus';

const ONE_TURN: TurnPhase[] = ['UPKEEP', 'ACT_FIRST', 'ACT_SECOND', 'TERMINATION_CHECK'];

describe('TurnManager', () => {
  let tm: TurnManager;

  beforeEach(() => {
    tm = new TurnManager();
  });

  // ── Initial state ────────────────────────────────────────────────
  it('starts in SETUP', () => {
    expect(tm.phase).toBe('SETUP');
    expect(tm.isOver).toBe(false);
  });

  // ── Valid transitions ────────────────────────────────────────────
  it('walks one full turn and loops through SNAPSHOT', () => {
    for (const phase of ONE_TURN) expect(tm.transition(phase)).toBe(true);
    expect(tm.transition('SNAPSHOT')).toBe(true);
    expect(tm.transition('UPKEEP')).toBe(true);
    expect(tm.phase).toBe('UPKEEP');
  });

  it('ends from TERMINATION_CHECK', () => {
    for (const phase of ONE_TURN) tm.transition(phase);
    expect(tm.transition('GAME_OVER')).toBe(true);
    expect(tm.isOver).toBe(true);
  });

  it('ends straight from SETUP', () => {
    expect(tm.transition('GAME_OVER')).toBe(true);
    expect(tm.phase).toBe('GAME_OVER');
  });

  // ── Invalid transitions (no-op) ──────────────────────────────────
  it('ignores SETUP → ACT_FIRST', () => {
    expect(tm.transition('ACT_FIRST')).toBe(false);
    expect(tm.phase).toBe('SETUP');
  });

  it('ignores skipping the second mover', () => {
    tm.transition('UPKEEP');
    tm.transition('ACT_FIRST');
    expect(tm.transition('TERMINATION_CHECK')).toBe(false);
    expect(tm.phase).toBe('ACT_FIRST');
  });

  it('ignores everything once GAME_OVER', () => {
    tm.transition('GAME_OVER');
    expect(tm.transition('UPKEEP')).toBe(false);
    expect(tm.phase).toBe('GAME_OVER');
  });

  it('logs the rejected transition', () => {
    const handler = vi.fn();
    EventBus.on('logMessage', handler);
    tm.transition('SNAPSHOT');
    expect(handler).toHaveBeenCalledWith({
      text: '[TurnManager] Invalid transition: SETUP → SNAPSHOT. Allowed: [UPKEEP, GAME_OVER]',
      cls: 'critical',
    });
  });

  // ── EventBus emission ────────────────────────────────────────────
  it('emits phaseChanged event on valid transition', () => {
    const handler = vi.fn();
    EventBus.on('phaseChanged', handler);
    tm.transition('UPKEEP');
    expect(handler).toHaveBeenCalledWith({ phase: 'UPKEEP' });
  });

  it('does not emit phaseChanged on invalid transition', () => {
    const handler = vi.fn();
    EventBus.on('phaseChanged', handler);
    tm.transition('ACT_SECOND');
    expect(handler).not.toHaveBeenCalled();
  });

  // ── reset ────────────────────────────────────────────────────────
  it('reset returns to SETUP', () => {
    tm.transition('GAME_OVER');
    tm.reset();
    expect(tm.phase).toBe('SETUP');
  });
});
