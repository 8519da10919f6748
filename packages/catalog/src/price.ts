/**
 * Numeric magnitude of a formatted price such as `฿1,290.00` or `1.299,50 €`.
 * Currency glyphs and codes are ignored. `null` for non-positive or unreadable text.
 */
export function parsePriceFromText(input: string): number | null {
  const trimmed = input.replace(/\s+/g, " ").trim();
  const numberMatch = trimmed.match(/[0-9](?:[0-9.,\s]*[0-9])?/);
  if (!numberMatch) {
    return null;
  }

  const raw = numberMatch[0].replace(/\s/g, "");
  const value = Number.parseFloat(normalizeNumber(raw, detectDecimalSeparator(raw)));

  if (!Number.isFinite(value) || value <= 0) {
    return null;
  }

  return value;
}

function detectDecimalSeparator(value: string): "." | "," | null {
  const dot = value.lastIndexOf(".");
  const comma = value.lastIndexOf(",");

  if (dot !== -1 && comma !== -1) {
    return dot > comma ? "." : ",";
  }

  // A lone separator followed by exactly three digits is a thousands separator.
  if (comma !== -1) {
    const trailing = value.length - comma - 1;
    return trailing === 3 || value.indexOf(",") !== comma ? null : ",";
  }

  if (dot !== -1) {
    const trailing = value.length - dot - 1;
    return trailing === 3 || value.indexOf(".") !== dot ? null : ".";
  }

  return null;
}

function normalizeNumber(value: string, decimalSeparator: "." | "," | null): string {
  if (decimalSeparator === ".") {
    return value.replace(/,/g, "");
  }

  if (decimalSeparator === ",") {
    return value.replace(/\./g, "").replace(",", ".");
  }

  return value.replace(/[.,]/g, "");
}
