import Table from 'cli-table3';

export function formatTable(
  rows: readonly (readonly unknown[])[],
  options: Table.TableConstructorOptions = {},
): string {
  const table = new Table({ style: { head: [], border: [] }, ...options });
  rows.forEach((row) => table.push(row.map((v) => String(v ?? ''))));
  return table.toString();
}
