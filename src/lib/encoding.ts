/** Wire payloads arrive either as text or as UTF-8 bytes. */
export function decodeText(input: string | Uint8Array): string {
  return typeof input === 'string' ? input : Buffer.from(input).toString('utf8');
}

export function firstSignificantChar(text: string): string | undefined {
  const match = /\S/.exec(text);
  return match?.[0];
}
