import { tierRank, type Pattern, type PrioritizedTarget, type Tier } from '../canvas/types.js';
import { loadPattern } from './PatternLoader.js';

export interface TargetSource {
  tier: Tier;
  x: number;
  y: number;
  pattern: string; // path to the pattern file
}

export interface PatternSetSummary {
  tier: Tier;
  source: string;
  origin: { x: number; y: number };
  pixels: number;
}

/**
 * Tier-ordered, frozen list of targets. Defensive patterns come before build patterns,
 * and that order never changes after construction.
 */
export class PatternSet {
  readonly targets: readonly PrioritizedTarget[];

  constructor(targets: readonly PrioritizedTarget[]) {
    const primaries = targets.filter((t) => t.tier === 'defensive-primary');
    if (primaries.length !== 1) {
      throw new Error(`Exactly one defensive-primary target is required, got ${primaries.length}`);
    }
    const seen = new Set<Tier>();
    for (const t of targets) {
      if (seen.has(t.tier)) throw new Error(`Duplicate target for tier ${t.tier}`);
      seen.add(t.tier);
    }

    // Array.prototype.sort is stable, so equal ranks keep their given order
    const ordered = [...targets].sort((a, b) => tierRank(a.tier) - tierRank(b.tier));
    this.targets = Object.freeze(ordered.map((t) => Object.freeze({ pattern: t.pattern, tier: t.tier })));
  }

  static async load(sources: readonly TargetSource[]): Promise<PatternSet> {
    const targets: PrioritizedTarget[] = [];
    for (const source of sources) {
      const pattern: Pattern = await loadPattern(source.pattern, { x: source.x, y: source.y });
      targets.push({ pattern, tier: source.tier });
    }
    return new PatternSet(targets);
  }

  get size(): number {
    return this.targets.length;
  }

  get totalPixels(): number {
    return this.targets.reduce((sum, t) => sum + t.pattern.pixels.length, 0);
  }

  summary(): PatternSetSummary[] {
    return this.targets.map((t) => ({
      tier: t.tier,
      source: t.pattern.source,
      origin: { x: t.pattern.origin.x, y: t.pattern.origin.y },
      pixels: t.pattern.pixels.length,
    }));
  }
}
