/**
 * Indexer event actions, narrowed from the loosely-typed API payload.
 * Anything that does not fit a known kind becomes `Unrecognized`.
 */

export interface TonTransferAction {
  kind: 'TonTransfer';
  sender?: string;
  amount?: string; // nanotons
  comment?: string; // plain text
  payload?: string; // base64 comment body
}

export interface JettonTransferAction {
  kind: 'JettonTransfer';
  sender?: string;
  amount?: string; // smallest token units
  symbol?: string;
  decimals?: unknown; // validated by the interpreter
}

export interface ContractDeployAction {
  kind: 'ContractDeploy';
  address?: string;
}

export interface SmartContractExecAction {
  kind: 'SmartContractExec';
  executor?: string;
  contract?: string;
  tonAttached?: string; // nanotons
  operation?: string;
}

export interface UnrecognizedAction {
  kind: 'Unrecognized';
  type?: string;
}

export type RawAction =
  | TonTransferAction
  | JettonTransferAction
  | ContractDeployAction
  | SmartContractExecAction
  | UnrecognizedAction;
