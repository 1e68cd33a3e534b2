import { readUnits } from '@common/decimal/amount';
import { RawAction } from './raw-event.types';

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: UnknownRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function readRecord(record: UnknownRecord, key: string): UnknownRecord {
  const value = record[key];
  return isRecord(value) ? value : {};
}

function readAddress(record: UnknownRecord, key: string): string | undefined {
  return readString(readRecord(record, key), 'address');
}

function readOperation(record: UnknownRecord): string | undefined {
  const value = record.operation;
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return value.toString();
  }
  return typeof value === 'string' ? value : undefined;
}

/**
 * Narrows the first entry of `event.actions`. Returns null when there is
 * nothing to interpret; later actions are never read.
 */
export function readPrimaryAction(event: unknown): RawAction | null {
  if (!isRecord(event)) {
    return null;
  }

  const { actions } = event;
  if (!Array.isArray(actions) || actions.length === 0) {
    return null;
  }

  const primary: unknown = actions[0];
  if (!isRecord(primary)) {
    return { kind: 'Unrecognized' };
  }

  const type = readString(primary, 'type');

  switch (type) {
    case 'TonTransfer': {
      const fields = readRecord(primary, type);
      return {
        kind: type,
        sender: readAddress(fields, 'sender'),
        amount: readUnits(fields.amount),
        comment: readString(fields, 'comment'),
        payload: readString(fields, 'payload'),
      };
    }
    case 'JettonTransfer': {
      const fields = readRecord(primary, type);
      const jetton = readRecord(fields, 'jetton');
      return {
        kind: type,
        sender: readAddress(fields, 'sender'),
        amount: readUnits(fields.amount),
        symbol: readString(jetton, 'symbol'),
        decimals: jetton.decimals,
      };
    }
    case 'ContractDeploy': {
      const fields = readRecord(primary, type);
      return { kind: type, address: readString(fields, 'address') };
    }
    case 'SmartContractExec': {
      const fields = readRecord(primary, type);
      return {
        kind: type,
        executor: readAddress(fields, 'executor'),
        contract: readAddress(fields, 'contract'),
        tonAttached: readUnits(fields.ton_attached),
        operation: readOperation(fields),
      };
    }
    default:
      return { kind: 'Unrecognized', type };
  }
}
