import { decodeComment } from '@common/decode-base64';
import {
  fromNano,
  fromUnits,
  normalizeDecimals,
  zeroAmount,
} from '@common/decimal/amount';
import { reasonOf } from '@common/errors/single-line-message';
import {
  defang,
  sanitizeText,
  stripNonPrintable,
} from '@common/text/text-sanitizer';
import type { Decimal } from 'decimal.js';
import { resolveOperationName } from './opcodes';
import { readPrimaryAction } from './raw-event.reader';
import {
  JettonTransferAction,
  RawAction,
  SmartContractExecAction,
  TonTransferAction,
} from './raw-event.types';
import { ScamDenylist } from './scam-denylist';

export enum Direction {
  In = 'in',
  Out = 'out',
  Neutral = 'neutral',
}

/**
 * Display-ready summary of the primary action of an indexer event
 */
export interface EventInterpretation {
  action: string;
  direction: Direction;
  description: string; // sanitized and defanged
  isScamRisk: boolean;
  sender: string;
  amount: Decimal;
  currency: string;
  warning?: string; // only when a fault was absorbed
}

export interface InterpretOptions {
  denylist?: ScamDenylist;
}

export const UNKNOWN_SENDER = 'Unknown';
export const DEFAULT_TOKEN_SYMBOL = 'TOKEN';
export const SCAM_WARNING_SUFFIX = ' ⚠️ SCAM RISK: suspicious token symbol';

const DEFAULT_DENYLIST = new ScamDenylist();

function defaultInterpretation(): EventInterpretation {
  return {
    action: 'Transaction',
    direction: Direction.Neutral,
    description: 'Interaction',
    isScamRisk: false,
    sender: UNKNOWN_SENDER,
    amount: zeroAmount(),
    currency: 'TON',
  };
}

function displaySender(address?: string): string {
  return (address && sanitizeText(address)) || UNKNOWN_SENDER;
}

function transferDirection(sender?: string, wallet?: string): Direction {
  return sender !== undefined && sender === wallet
    ? Direction.Out
    : Direction.In;
}

// Indexers return either the encoded body or an already plain comment
function resolveComment(action: TonTransferAction): string {
  const decoded = decodeComment(action.payload);
  if (decoded) {
    return decoded;
  }
  return action.comment ? defang(stripNonPrintable(action.comment).trim()) : '';
}

function describeTonTransfer(
  action: TonTransferAction,
  wallet?: string,
): EventInterpretation {
  const comment = resolveComment(action);

  return {
    ...defaultInterpretation(),
    action: '💰 TON Transfer',
    direction: transferDirection(action.sender, wallet),
    description: comment ? `Msg: ${comment}` : 'Direct Transfer',
    sender: displaySender(action.sender),
    amount: fromNano(action.amount),
  };
}

function describeJettonTransfer(
  action: JettonTransferAction,
  denylist: ScamDenylist,
  wallet?: string,
): EventInterpretation {
  const rawSymbol = stripNonPrintable(action.symbol ?? '');
  const symbol = defang(rawSymbol) || DEFAULT_TOKEN_SYMBOL;
  const decimals = normalizeDecimals(action.decimals);
  const amount = action.amount
    ? fromUnits(action.amount, decimals)
    : zeroAmount();
  const isScamRisk = denylist.matches(rawSymbol);

  let description = `Volume: ${amount.toFixed()} ${symbol}`;
  if (isScamRisk) {
    description += SCAM_WARNING_SUFFIX;
  }

  return {
    action: `💸 ${symbol} Transfer`,
    direction: transferDirection(action.sender, wallet),
    description,
    isScamRisk,
    sender: displaySender(action.sender),
    amount,
    currency: symbol,
  };
}

function describeContractExec(
  action: SmartContractExecAction,
  wallet?: string,
): EventInterpretation {
  const operation = action.operation
    ? sanitizeText(action.operation)
    : 'Unknown';
  const isOwnCall =
    action.executor !== undefined && action.executor === wallet;

  return {
    ...defaultInterpretation(),
    action: `⚙️ ${resolveOperationName(action.operation)}`,
    direction: isOwnCall ? Direction.Out : Direction.Neutral,
    description: `Op: ${operation}`,
    sender: displaySender(action.executor),
    amount: fromNano(action.tonAttached),
  };
}

function describeAction(
  action: RawAction,
  denylist: ScamDenylist,
  wallet?: string,
): EventInterpretation {
  switch (action.kind) {
    case 'TonTransfer':
      return describeTonTransfer(action, wallet);
    case 'JettonTransfer':
      return describeJettonTransfer(action, denylist, wallet);
    case 'ContractDeploy':
      return {
        ...defaultInterpretation(),
        action: '🛠 Contract Deploy',
        description: 'New smart contract deployment',
      };
    case 'SmartContractExec':
      return describeContractExec(action, wallet);
    case 'Unrecognized':
      return defaultInterpretation();
  }
}

/**
 * Interprets the first action of an indexer event relative to
 * `referenceWallet`. Never throws: faults end up in `warning`.
 */
export function interpretEvent(
  event: unknown,
  referenceWallet?: string,
  options: InterpretOptions = {},
): EventInterpretation {
  try {
    const action = readPrimaryAction(event);
    if (!action) {
      return defaultInterpretation();
    }
    return describeAction(
      action,
      options.denylist ?? DEFAULT_DENYLIST,
      referenceWallet,
    );
  } catch (error) {
    const reason = `Interpretation Error: ${sanitizeText(reasonOf(error))}`;
    return { ...defaultInterpretation(), description: reason, warning: reason };
  }
}
