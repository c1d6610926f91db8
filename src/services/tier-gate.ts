// src/services/tier-gate.ts: plan-based capability gating, resolved once per request
import type { Capability, Plan, SearchMode } from '@/types/core';

export interface TierGate {
  allowedModes(plan: Plan): ReadonlySet<Capability>;
}

const SEARCH_ONLY: readonly Capability[] = ['keyword', 'semantic', 'hybrid'];
const FULL: readonly Capability[] = [...SEARCH_ONLY, 'multi_query'];

const PLAN_CAPABILITIES: Readonly<Record<Plan, readonly Capability[]>> = {
  FREE: ['keyword'],
  PRO: SEARCH_ONLY,
  TEAM: FULL,
  ENTERPRISE: FULL,
  PARTNER: FULL,
};

export class PlanTierGate implements TierGate {
  allowedModes(plan: Plan): ReadonlySet<Capability> {
    return new Set(PLAN_CAPABILITIES[plan]);
  }
}

// Preferred fallback order when the requested mode is not allowed.
const DOWNGRADE_ORDER: Readonly<Record<SearchMode, readonly SearchMode[]>> = {
  hybrid: ['hybrid', 'semantic', 'keyword'],
  semantic: ['semantic', 'keyword'],
  keyword: ['keyword'],
};

/** Picks the first allowed mode for a request; keyword when nothing richer is allowed. */
export function resolveSearchMode(
  requested: SearchMode,
  allowed: ReadonlySet<Capability>,
): { mode: SearchMode; downgraded: boolean } {
  const mode = DOWNGRADE_ORDER[requested].find((m) => allowed.has(m)) ?? 'keyword';
  return { mode, downgraded: mode !== requested };
}
