/**
 * OCC "delo" download parser.
 *
 * The file is nominally tab-separated with the underlying symbol in the second
 * column, e.g. "1AAL  \tAAL   \tAmerican Airlines Group, Inc. (AMER/FLEX)\t...",
 * but the delimiters are not consistent across rows.
 */

export const MIN_SYMBOL_LENGTH = 1;
export const MAX_SYMBOL_LENGTH = 4;

export type SkipReason = "too-few-fields" | "invalid-symbol";

export interface SkippedLine {
  line: number;
  reason: SkipReason;
  text: string;
}

export interface SymbolFeedParseResult {
  symbols: Set<string>;
  lineCount: number;
  skipped: SkippedLine[];
}

/** Tab split first; whitespace runs only when the row has no tab at all. */
export function splitFeedLine(line: string): string[] {
  const parts = line.split("\t");
  if (parts.length < 2 && !line.includes("\t")) {
    return line.split(/\s+/).filter((p) => p.length > 0);
  }
  return parts;
}

/** Strip everything but ASCII letters and digits, then upper-case. */
export function cleanSymbol(raw: string): string {
  return raw.replace(/[^A-Za-z0-9]/g, "").toUpperCase();
}

export function isValidSymbol(symbol: string): boolean {
  return symbol.length >= MIN_SYMBOL_LENGTH && symbol.length <= MAX_SYMBOL_LENGTH && /^[A-Z0-9]+$/.test(symbol);
}

export function parseSymbolFeed(text: string): SymbolFeedParseResult {
  const symbols = new Set<string>();
  const skipped: SkippedLine[] = [];
  const lines = text.trim().split(/\r?\n/);
  let lineCount = 0;

  lines.forEach((line, idx) => {
    if (!line.trim()) return;
    lineCount++;

    const parts = splitFeedLine(line);
    if (parts.length < 2) {
      skipped.push({ line: idx + 1, reason: "too-few-fields", text: line.slice(0, 50) });
      return;
    }

    const symbol = cleanSymbol(parts[1]);
    if (!isValidSymbol(symbol)) {
      skipped.push({ line: idx + 1, reason: "invalid-symbol", text: parts[1].slice(0, 50) });
      return;
    }
    symbols.add(symbol);
  });

  return { symbols, lineCount, skipped };
}
