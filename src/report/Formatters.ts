/** @return milliseconds with microsecond precision */
export function timeMs(v: unknown): string | null {
  if (typeof v !== "number") return null;
  return `${v.toFixed(3)}ms`;
}

/** @return value already in percent, e.g. 33.3333 -> "33.33%" */
export function percent(v: unknown): string | null {
  if (typeof v !== "number") return null;
  return `${v.toFixed(2)}%`;
}

/** @return loss percent with enough digits to show small loss */
export function lossPercent(v: unknown): string | null {
  if (typeof v !== "number") return null;
  return `${v.toFixed(4)}%`;
}

/** @return signed percent, e.g. +12.5% */
export function signedPercent(v: unknown): string | null {
  if (typeof v !== "number") return null;
  const sign = v > 0 ? "+" : "";
  return `${sign}${v.toFixed(1)}%`;
}

/** @return integer with thousands separators */
export function integer(v: unknown): string | null {
  if (typeof v !== "number") return null;
  return Math.round(v).toLocaleString("en-US");
}

/** @return rate in Mbps */
export function mbps(v: unknown): string | null {
  if (typeof v !== "number") return null;
  return `${v.toFixed(2)} Mbps`;
}

/** @return string shortened with an ellipsis to fit maxLength */
export function truncate(str: string, maxLength = 30): string {
  if (str.length <= maxLength) return str;
  return `${str.slice(0, maxLength - 3)}...`;
}
