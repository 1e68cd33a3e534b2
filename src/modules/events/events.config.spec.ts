import { interpretEvent } from '@modules/events/event-interpreter';
import { EventsConfig } from '@modules/events/events.config';
import { ScamDenylist } from '@modules/events/scam-denylist';

const FREE_GIFT_EVENT = {
  actions: [
    {
      type: 'JettonTransfer',
      JettonTransfer: {
        sender: { address: 'A' },
        amount: '1000000000',
        jetton: { symbol: 'FREE-GIFT', decimals: 9 },
      },
    },
  ],
};

describe('EventsConfig', () => {
  const previous = process.env.SCAM_SYMBOL_PATTERNS;

  afterEach(() => {
    if (previous === undefined) {
      delete process.env.SCAM_SYMBOL_PATTERNS;
    } else {
      process.env.SCAM_SYMBOL_PATTERNS = previous;
    }
  });

  it('Should have no extra patterns when unset or blank', () => {
    delete process.env.SCAM_SYMBOL_PATTERNS;
    expect(new EventsConfig().scamSymbolPatterns).toEqual([]);

    process.env.SCAM_SYMBOL_PATTERNS = '  ';
    expect(new EventsConfig().scamSymbolPatterns).toEqual([]);
  });

  it('Should normalize configured patterns', () => {
    process.env.SCAM_SYMBOL_PATTERNS = 'Moon, RUG ,,moon';

    expect(new EventsConfig().scamSymbolPatterns).toEqual(['moon', 'rug']);
  });

  it('Should never switch off the built-in patterns', () => {
    for (const configured of [',,,', 'moon']) {
      process.env.SCAM_SYMBOL_PATTERNS = configured;
      const denylist = new ScamDenylist(new EventsConfig().scamSymbolPatterns);

      const result = interpretEvent(FREE_GIFT_EVENT, 'B', { denylist });

      expect(result.isScamRisk).toBe(true);
    }
  });
});
