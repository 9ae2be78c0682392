const currencyFormat = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** `1234.5` → `$1,234.50`, `-95` → `-$95.00`. */
export const formatCurrency = (value: number): string => {
  const formatted = currencyFormat.format(Math.abs(value));
  return value < 0 ? `-$${formatted}` : `$${formatted}`;
};

/** Formats a 0-100 scaled percentage. */
export const formatPercent = (value: number, digits = 2): string => `${value.toFixed(digits)}%`;

export const formatRatio = (value: number | null, digits = 2): string =>
  value === null ? "n/a" : value.toFixed(digits);

const escapeCell = (value: string): string => value.replace(/\|/g, "\\|");

/**
 * GitHub-flavored table. Cells are escaped; rows shorter than the header are
 * padded with empty cells.
 */
export const markdownTable = (
  headers: ReadonlyArray<string>,
  rows: ReadonlyArray<ReadonlyArray<string>>,
): string => {
  const line = (cells: ReadonlyArray<string>) =>
    `| ${headers.map((_, index) => escapeCell(cells[index] ?? "")).join(" | ")} |`;
  return [line(headers), `| ${headers.map(() => "---").join(" | ")} |`, ...rows.map(line)].join("\n");
};

/** Two-column table of label/value pairs. */
export const keyValueTable = (entries: ReadonlyArray<readonly [string, string]>): string =>
  markdownTable(
    ["Metric", "Value"],
    entries.map(([label, value]) => [label, value]),
  );

export const formatParams = (params: Readonly<Record<string, unknown>>): string => {
  const entries = Object.entries(params);
  if (entries.length === 0) {
    return "defaults";
  }
  return entries.map(([key, value]) => `${key}=${String(value)}`).join(", ");
};
