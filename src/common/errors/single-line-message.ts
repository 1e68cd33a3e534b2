export function singleLineMessage(e: Error): string {
  return (e.stack ?? e.message ?? e.name ?? 'undefined').replace(/\s+/g, ' ');
}

/**
 * Short single-line reason for anything thrown, without the stack
 */
export function reasonOf(thrown: unknown): string {
  let text = `${typeof thrown} thrown`;
  if (thrown instanceof Error) {
    text = thrown.message;
  } else if (typeof thrown === 'string') {
    text = thrown;
  }
  return text.replace(/\s+/g, ' ').trim() || 'unknown error';
}
