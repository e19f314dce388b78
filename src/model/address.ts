/**
 * Spreadsheet-style cell addressing (A1 notation)
 */

/**
 * Column letters for a zero-based column index (0 -> A, 26 -> AA)
 */
export function columnLetters(columnIndex: number): string {
  let n = columnIndex + 1;
  let letters = '';
  while (n > 0) {
    const remainder = (n - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

/**
 * Address of a cell from zero-based row and column indices (0, 1 -> B1)
 */
export function cellAddress(rowIndex: number, columnIndex: number): string {
  return `${columnLetters(columnIndex)}${rowIndex + 1}`;
}

/**
 * Parse an A1 address into zero-based indices, or null if it is not one
 */
export function parseCellAddress(address: string): { row: number; column: number } | null {
  const match = /^([A-Z]+)(\d+)$/.exec(address.toUpperCase());
  if (!match) return null;

  let column = 0;
  for (const ch of match[1]) {
    column = column * 26 + (ch.charCodeAt(0) - 64);
  }

  const row = parseInt(match[2], 10);
  if (row < 1) return null;

  return { row: row - 1, column: column - 1 };
}
