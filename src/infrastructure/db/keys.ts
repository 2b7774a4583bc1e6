/**
 * Serial keys travel through the application as opaque strings.
 * Anything that is not a positive safe integer cannot name a row.
 */
export function parseSerial(value: string): number | undefined {
  if (!/^[1-9]\d*$/.test(value)) {
    return undefined;
  }
  const n = Number(value);
  return Number.isSafeInteger(n) ? n : undefined;
}
