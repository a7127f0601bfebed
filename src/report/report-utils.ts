export function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const border = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => `| ${line.padEnd(width)} |`);
  return [border, ...body, border].join("\n");
}

export function renderAsciiTable(
  rows: readonly (readonly string[])[],
  headers: readonly string[],
): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const renderRow = (row: readonly string[]) =>
    `| ${row.map((cell, index) => cell.padEnd(widths[index] ?? 0)).join(" | ")} |`;
  return [border, renderRow(headers), border, ...rows.map(renderRow), border].join(
    "\n",
  );
}

export function truncateText(input: string, max: number): string {
  if (input.length <= max) {
    return input;
  }
  return `${input.slice(0, Math.max(0, max - 3))}...`;
}

export function applyFindingLimit<T>(items: readonly T[], limit?: number): T[] {
  if (!limit || limit <= 0) {
    return [...items];
  }
  return items.slice(0, limit);
}
