import {
  Direction,
  interpretEvent,
  SCAM_WARNING_SUFFIX,
} from '@modules/events/event-interpreter';
import { ScamDenylist } from '@modules/events/scam-denylist';

function encode(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}

function jettonEvent(jetton: Record<string, unknown>, sender = 'A'): object {
  return {
    actions: [
      {
        type: 'JettonTransfer',
        JettonTransfer: {
          sender: { address: sender },
          amount: '1000000000',
          jetton,
        },
      },
    ],
  };
}

function tonEvent(transfer: Record<string, unknown>): object {
  return { actions: [{ type: 'TonTransfer', TonTransfer: transfer }] };
}

describe('interpretEvent', () => {
  describe('JettonTransfer', () => {
    it('Should flag scam-looking tokens', () => {
      const result = interpretEvent(
        jettonEvent({ symbol: 'FREE-GIFT', decimals: 9 }),
        'B',
      );

      expect(result.direction).toBe(Direction.In);
      expect(result.direction).toBe('in');
      expect(result.amount.toString()).toBe('1');
      expect(result.currency).toBe('FREE-GIFT');
      expect(result.isScamRisk).toBe(true);
      expect(result.sender).toBe('A');
      expect(result.action).toBe('💸 FREE-GIFT Transfer');
      expect(result.description).toBe(
        `Volume: 1 FREE-GIFT${SCAM_WARNING_SUFFIX}`,
      );
      expect(result.warning).toBeUndefined();
    });

    it('Should describe regular tokens', () => {
      const result = interpretEvent(
        {
          actions: [
            {
              type: 'JettonTransfer',
              JettonTransfer: {
                sender: { address: 'B' },
                amount: '2500000',
                jetton: { symbol: 'USDT', decimals: 6 },
              },
            },
          ],
        },
        'B',
      );

      expect(result.direction).toBe(Direction.Out);
      expect(result.amount.toString()).toBe('2.5');
      expect(result.description).toBe('Volume: 2.5 USDT');
      expect(result.isScamRisk).toBe(false);
    });

    it('Should treat out-of-range decimals as 9', () => {
      const huge = interpretEvent(jettonEvent({ symbol: 'X', decimals: 1000 }));
      const nine = interpretEvent(jettonEvent({ symbol: 'X', decimals: 9 }));
      const negative = interpretEvent(jettonEvent({ symbol: 'X', decimals: -3 }));
      const missing = interpretEvent(jettonEvent({ symbol: 'X' }));

      expect(huge.amount.toString()).toBe('1');
      expect(huge).toEqual(nine);
      expect(negative.amount.toString()).toBe('1');
      expect(missing.amount.toString()).toBe('1');
    });

    it('Should compare the reference wallet case-sensitively', () => {
      const result = interpretEvent(jettonEvent({ symbol: 'X' }, 'b'), 'B');

      expect(result.direction).toBe(Direction.In);
    });

    it('Should see through invisible characters in symbols', () => {
      const result = interpretEvent(jettonEvent({ symbol: 'FR\u200bEE' }));

      expect(result.isScamRisk).toBe(true);
      expect(result.currency).toBe('FREE');
    });

    it('Should defang symbols that look like domains', () => {
      const result = interpretEvent(jettonEvent({ symbol: 'claim-ton.org' }));

      expect(result.currency).toBe('claim-ton[.]org');
      expect(result.action).toBe('💸 claim-ton[.]org Transfer');
      expect(result.isScamRisk).toBe(true);
    });

    it('Should default the symbol', () => {
      const result = interpretEvent(jettonEvent({}));

      expect(result.currency).toBe('TOKEN');
      expect(result.description).toBe('Volume: 1 TOKEN');
    });

    it('Should use a custom denylist', () => {
      const denylist = new ScamDenylist(['moon']);

      expect(
        interpretEvent(jettonEvent({ symbol: 'MOONCOIN' }), 'B', { denylist })
          .isScamRisk,
      ).toBe(true);
      expect(
        interpretEvent(jettonEvent({ symbol: 'FREE-GIFT' }), 'B', { denylist })
          .isScamRisk,
      ).toBe(true);
      expect(
        interpretEvent(jettonEvent({ symbol: 'USDT' }), 'B', { denylist })
          .isScamRisk,
      ).toBe(false);
    });
  });

  describe('TonTransfer', () => {
    it('Should decode and defang the comment payload', () => {
      const result = interpretEvent(
        tonEvent({
          sender: { address: 'A' },
          amount: 2500000000,
          payload: encode('Claim at https://evil.com'),
        }),
        'A',
      );

      expect(result.action).toBe('💰 TON Transfer');
      expect(result.direction).toBe(Direction.Out);
      expect(result.description).toBe('Msg: Claim at hxxps://evil[.]com');
      expect(result.amount.toString()).toBe('2.5');
      expect(result.currency).toBe('TON');
      expect(result.isScamRisk).toBe(false);
    });

    it('Should fall back to the plain comment', () => {
      const plain = interpretEvent(
        tonEvent({ amount: '1000000000', comment: 'thanks for lunch\n' }),
      );
      const broken = interpretEvent(
        tonEvent({ payload: '!!!', comment: 'see x.io' }),
      );

      expect(plain.description).toBe('Msg: thanks for lunch');
      expect(plain.amount.toString()).toBe('1');
      expect(broken.description).toBe('Msg: see x[.]io');
    });

    it('Should report direct transfers', () => {
      const result = interpretEvent(
        tonEvent({ sender: { address: 'A' }, amount: '1' }),
        'B',
      );

      expect(result.description).toBe('Direct Transfer');
      expect(result.direction).toBe(Direction.In);
      expect(result.amount.toString()).toBe('0.000000001');
    });

    it('Should show the placeholder for oversized payloads', () => {
      const result = interpretEvent(tonEvent({ payload: 'A'.repeat(5000) }));

      expect(result.description).toBe('Msg: <encoded payload too large>');
    });

    it('Should report unknown senders', () => {
      const result = interpretEvent(tonEvent({ amount: 'lots' }));

      expect(result.sender).toBe('Unknown');
      expect(result.direction).toBe(Direction.In);
      expect(result.amount.toString()).toBe('0');
    });
  });

  it('Should describe contract deployment', () => {
    const result = interpretEvent(
      { actions: [{ type: 'ContractDeploy', ContractDeploy: { address: 'D' } }] },
      'D',
    );

    expect(result.action).toBe('🛠 Contract Deploy');
    expect(result.description).toBe('New smart contract deployment');
    expect(result.direction).toBe(Direction.Neutral);
    expect(result.amount.toString()).toBe('0');
    expect(result.sender).toBe('Unknown');
  });

  describe('SmartContractExec', () => {
    function execEvent(fields: Record<string, unknown>): object {
      return {
        actions: [{ type: 'SmartContractExec', SmartContractExec: fields }],
      };
    }

    it('Should name known operations', () => {
      const result = interpretEvent(
        execEvent({
          executor: { address: 'B' },
          ton_attached: 50000000,
          operation: '0xf8a7ea5',
        }),
        'B',
      );

      expect(result.action).toBe('⚙️ 💸 Jetton Transfer');
      expect(result.description).toBe('Op: 0xf8a7ea5');
      expect(result.direction).toBe(Direction.Out);
      expect(result.sender).toBe('B');
      expect(result.amount.toString()).toBe('0.05');
    });

    it('Should fall back for unknown operations', () => {
      const result = interpretEvent(
        execEvent({ executor: { address: 'C' }, operation: 'JettonNotify' }),
        'B',
      );

      expect(result.action).toBe('⚙️ Call Contract');
      expect(result.description).toBe('Op: JettonNotify');
      expect(result.direction).toBe(Direction.Neutral);
    });

    it('Should describe missing operations', () => {
      const result = interpretEvent(execEvent({}));

      expect(result.action).toBe('⚙️ Call Contract');
      expect(result.description).toBe('Op: Unknown');
    });
  });

  it('Should return the default result for unknown events', () => {
    const inputs: unknown[] = [
      null,
      undefined,
      42,
      'event',
      [],
      {},
      { actions: [] },
      { actions: [null] },
      { actions: [{ type: 'NftPurchase', NftPurchase: {} }] },
      { actions: [{ type: '__proto__' }] },
    ];

    for (const input of inputs) {
      const result = interpretEvent(input, 'B');

      expect(result.action).toBe('Transaction');
      expect(result.description).toBe('Interaction');
      expect(result.direction).toBe(Direction.Neutral);
      expect(result.isScamRisk).toBe(false);
      expect(result.sender).toBe('Unknown');
      expect(result.amount.toString()).toBe('0');
      expect(result.currency).toBe('TON');
      expect(result.warning).toBeUndefined();
    }
  });

  it('Should only interpret the first action', () => {
    const result = interpretEvent({
      actions: [
        { type: 'TonTransfer', TonTransfer: { amount: '1000000000' } },
        {
          type: 'JettonTransfer',
          JettonTransfer: { jetton: { symbol: 'FREE-GIFT' } },
        },
      ],
    });

    expect(result.action).toBe('💰 TON Transfer');
    expect(result.isScamRisk).toBe(false);
  });

  it('Should surface internal faults instead of throwing', () => {
    const event = {};
    Object.defineProperty(event, 'actions', {
      get(): never {
        throw new Error('indexer\nexploded');
      },
    });

    const result = interpretEvent(event, 'B');

    expect(result.description).toBe('Interpretation Error: indexer exploded');
    expect(result.warning).toBe('Interpretation Error: indexer exploded');
    expect(result.direction).toBe(Direction.Neutral);
    expect(result.isScamRisk).toBe(false);
  });
});
