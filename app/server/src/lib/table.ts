export type Cell = string | number | boolean;

function rule(widths: number[]): string {
  return '+' + widths.map((w) => '-'.repeat(w + 2)).join('+') + '+';
}

function line(cells: string[], widths: number[]): string {
  return '| ' + cells.map((cell, i) => cell.padEnd(widths[i])).join(' | ') + ' |';
}

export function renderTable(headers: string[], rows: Cell[][]): string {
  const body = rows.map((row) => row.map((cell) => String(cell)));
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...body.map((row) => (row[i] ?? '').length))
  );

  return [
    rule(widths),
    line(headers, widths),
    rule(widths),
    ...body.map((row) => line(row, widths)),
    rule(widths),
  ].join('\n');
}
