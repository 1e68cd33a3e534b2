import { ConfigFragment } from '@common/config/config-fragment';
import { UseEnv } from '@common/config/use-env.decorator';
import { IsArray, IsString } from 'class-validator';
import { normalizePatterns } from './scam-denylist';

function parsePatterns(raw?: string): string[] {
  return raw ? normalizePatterns(raw.split(',')) : [];
}

/**
 * Configuration for event interpretation
 */
export class EventsConfig extends ConfigFragment {
  /**
   * Extra lower-cased substrings that mark a token symbol as a likely scam,
   * on top of claim, gift, subs, free, voucher, airdrop, reward
   * Format: comma separated, e.g. "moon,bonus"
   * Default: none
   */
  @IsArray()
  @IsString({ each: true })
  @UseEnv('SCAM_SYMBOL_PATTERNS', parsePatterns)
  public readonly scamSymbolPatterns!: string[];
}
