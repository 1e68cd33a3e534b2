export const UNKNOWN_OPERATION_NAME = 'Call Contract';

/**
 * Known message operation codes (first 32 bits of the body)
 */
export const OPCODE_NAMES: ReadonlyMap<number, string> = new Map([
  [0x00000000, '💬 Text Comment'],
  [0x0f8a7ea5, '💸 Jetton Transfer'],
  [0x178d4519, '💳 Jetton Internal Transfer'],
  [0x7362d09c, '🔔 Jetton Transfer Notification'],
  [0x595f07bc, '🔥 Jetton Burn'],
  [0x5fcc3d14, '🖼 NFT Transfer'],
  [0x05138d91, '💎 SFX Deposit'],
  [0xd53276db, '🔙 Excesses (Cashback)'],
]);

/**
 * Accepts 0x-prefixed hex ("0xf8a7ea5") or a decimal string
 */
export function parseOpcode(raw: string): number | null {
  const trimmed = raw.trim();

  if (/^0x[0-9a-f]{1,8}$/i.test(trimmed)) {
    return parseInt(trimmed.slice(2), 16);
  }
  if (/^\d{1,10}$/.test(trimmed)) {
    const value = Number(trimmed);
    return value <= 0xffffffff ? value : null;
  }
  return null;
}

export function resolveOperationName(raw?: string): string {
  const code = raw === undefined ? null : parseOpcode(raw);
  if (code === null) {
    return UNKNOWN_OPERATION_NAME;
  }
  return OPCODE_NAMES.get(code) ?? UNKNOWN_OPERATION_NAME;
}
