/**
 * Transition relation indexed by (state, symbol).
 *
 * Rules equal in value collapse into one. Several distinct rules may share a
 * (state, symbol) key; lookups then resolve to the rule that was added first,
 * so a machine definition always runs the same way.
 *
 * @module
 */
import { rulesEqual, type TransitionRule } from "./types.js";

export interface Ambiguity {
  state: string;
  symbol: string;
  candidates: TransitionRule[];
}

export class TransitionTable {
  private readonly byState = new Map<string, Map<string, TransitionRule[]>>();
  private readonly ordered: TransitionRule[] = [];

  constructor(rules: Iterable<TransitionRule> = []) {
    for (const rule of rules) {
      this.add(rule);
    }
  }

  /** Returns false when an equal rule was already present. */
  add(rule: TransitionRule): boolean {
    let bySymbol = this.byState.get(rule.currentState);
    if (bySymbol === undefined) {
      bySymbol = new Map();
      this.byState.set(rule.currentState, bySymbol);
    }
    const candidates = bySymbol.get(rule.readSymbol);
    if (candidates === undefined) {
      bySymbol.set(rule.readSymbol, [rule]);
    } else if (candidates.some((existing) => rulesEqual(existing, rule))) {
      return false;
    } else {
      candidates.push(rule);
    }
    this.ordered.push(rule);
    return true;
  }

  lookup(state: string, symbol: string): TransitionRule | undefined {
    return this.byState.get(state)?.get(symbol)?.[0];
  }

  has(rule: TransitionRule): boolean {
    const candidates = this.byState.get(rule.currentState)?.get(
      rule.readSymbol,
    );
    return candidates?.some((existing) => rulesEqual(existing, rule)) ?? false;
  }

  get size(): number {
    return this.ordered.length;
  }

  rules(): TransitionRule[] {
    return [...this.ordered];
  }

  ambiguities(): Ambiguity[] {
    const result: Ambiguity[] = [];
    for (const [state, bySymbol] of this.byState) {
      for (const [symbol, candidates] of bySymbol) {
        if (candidates.length > 1) {
          result.push({ state, symbol, candidates: [...candidates] });
        }
      }
    }
    return result;
  }
}
