// src/services/context-budgeter.ts: greedy token-budget packing over a ranked list

export interface Budgetable {
  tokenCount: number;
}

export interface PackedContext<T extends Budgetable> {
  selected: T[];
  totalTokens: number;
  /** Ranked items that did not fit, in rank order. */
  skipped: T[];
}

/**
 * Walks `ranked` best-first, taking every item that still fits. An item larger
 * than the remaining budget is skipped whole (never truncated) and the next one
 * is tried; the walk ends when the budget or the candidates run out.
 */
export function packContext<T extends Budgetable>(ranked: readonly T[], budget: number): PackedContext<T> {
  const selected: T[] = [];
  const skipped: T[] = [];
  let remaining = Math.max(0, Math.floor(budget));

  for (let i = 0; i < ranked.length; i++) {
    const item = ranked[i];
    if (remaining === 0) {
      skipped.push(...ranked.slice(i));
      break;
    }
    if (item.tokenCount <= remaining) {
      selected.push(item);
      remaining -= item.tokenCount;
    } else {
      skipped.push(item);
    }
  }

  return {
    selected,
    totalTokens: selected.reduce((sum, item) => sum + item.tokenCount, 0),
    skipped,
  };
}
