import { describe, expect, it } from 'vitest';
import type { Capability } from '@/types/core';
import { PlanTierGate, resolveSearchMode } from '@/services/tier-gate';

describe('PlanTierGate', () => {
  const gate = new PlanTierGate();

  it('limits FREE to keyword search', () => {
    expect([...gate.allowedModes('FREE')]).toEqual(['keyword']);
  });

  it('adds multi-query from TEAM upwards', () => {
    expect(gate.allowedModes('PRO').has('multi_query')).toBe(false);
    expect(gate.allowedModes('TEAM').has('multi_query')).toBe(true);
    expect(gate.allowedModes('PARTNER').has('hybrid')).toBe(true);
  });
});

describe('resolveSearchMode', () => {
  const allowed = (...modes: Capability[]) => new Set<Capability>(modes);

  it('keeps an allowed mode', () => {
    expect(resolveSearchMode('hybrid', allowed('keyword', 'hybrid'))).toEqual({ mode: 'hybrid', downgraded: false });
  });

  it('downgrades hybrid to semantic, then keyword', () => {
    expect(resolveSearchMode('hybrid', allowed('keyword', 'semantic'))).toEqual({ mode: 'semantic', downgraded: true });
    expect(resolveSearchMode('hybrid', allowed('keyword'))).toEqual({ mode: 'keyword', downgraded: true });
  });

  it('falls back to keyword when nothing is allowed', () => {
    expect(resolveSearchMode('semantic', allowed())).toEqual({ mode: 'keyword', downgraded: true });
  });
});
