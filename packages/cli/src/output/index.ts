import Table from 'cli-table3';

export function printTable(
  data: Record<string, string | number>[],
  options?: Table.TableConstructorOptions,
) {
  if (data.length === 0) {
    return;
  }
  const head = options?.head ?? Object.keys(data[0]);
  const table = new Table({ ...options, head });
  data.forEach((row) => table.push(Object.values(row).map((v) => String(v))));
  console.log(table.toString());
}
