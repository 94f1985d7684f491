export function formatRows<TColumn extends string>(
  rows: Array<Record<TColumn, string>>,
  headers: readonly TColumn[],
): string {
  const widths = headers.map((header) => header.length);

  for (const row of rows) {
    headers.forEach((header, index) => {
      widths[index] = Math.max(widths[index] ?? 0, row[header].length);
    });
  }

  const headerLine = headers
    .map((header, index) => header.padEnd(widths[index] ?? header.length))
    .join('  ');
  const divider = headers
    .map((header, index) => ''.padEnd(widths[index] ?? header.length, '-'))
    .join('  ');
  const lines = rows.map((row) =>
    headers
      .map((header, index) => row[header].padEnd(widths[index] ?? header.length))
      .join('  ')
      .trimEnd(),
  );

  return [headerLine.trimEnd(), divider, ...lines].join('\n');
}
