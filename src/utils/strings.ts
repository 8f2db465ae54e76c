export function formatHexadecimal(value: number, pad = 8) {
  const prefix = value < 0 ? "-0x" : "0x";
  return prefix + Math.abs(value).toString(16).padStart(pad, "0");
}

export function formatAddress(value: number): string {
  return `$${value.toString(16)}`;
}
