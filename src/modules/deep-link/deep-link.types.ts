import type { Decimal } from 'decimal.js';

export enum PayloadKind {
  ContractCall = 'contract_call',
  StateInit = 'state_init',
  Both = 'both',
}

/**
 * Transfer intent extracted from a ton:// deep link
 */
export interface LinkParseResult {
  valid: boolean;
  destination?: string;
  amount: Decimal; // whole TON
  comment?: string; // defanged
  hasPayload: boolean;
  payloadKind?: PayloadKind;
  warning?: string; // anomalies joined with WARNING_SEPARATOR
}

export const WARNING_SEPARATOR = ' | ';

export const LinkWarning = {
  NonStandardStructure: '⚠️ Non-standard URL structure detected',
  MalformedAddress: '❌ Invalid or Malformed Address',
  InvalidAmount: '⚠️ Invalid amount ignored',
  BinaryPayload: '⚠️ Binary Payload Detected (Potential Smart Contract Call)',
  StateInit: '⚠️ State Init Detected (Contract Deployment)',
} as const;
