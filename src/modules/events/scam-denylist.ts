export const DEFAULT_SCAM_SYMBOL_PATTERNS: readonly string[] = [
  'claim',
  'gift',
  'subs',
  'free',
  'voucher',
  'airdrop',
  'reward',
];

export function normalizePatterns(patterns: readonly string[]): string[] {
  const normalized = patterns
    .map((pattern) => pattern.normalize('NFKC').trim().toLowerCase())
    .filter((pattern) => pattern.length > 0);

  return [...new Set(normalized)];
}

/**
 * Substring denylist for token symbols used by airdrop and "claim your
 * reward" scams. Extra patterns extend the built-in set, never replace it.
 */
export class ScamDenylist {
  private readonly patterns: readonly string[];

  constructor(extraPatterns: readonly string[] = []) {
    this.patterns = normalizePatterns([
      ...DEFAULT_SCAM_SYMBOL_PATTERNS,
      ...extraPatterns,
    ]);
  }

  public get size(): number {
    return this.patterns.length;
  }

  public matches(symbol: string): boolean {
    const subject = symbol.normalize('NFKC').toLowerCase();
    return this.patterns.some((pattern) => subject.includes(pattern));
  }
}
