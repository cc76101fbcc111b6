/**
 * CLI output formatting utilities
 *
 * Aligned text tables for human output and the JSON wrapper used by
 * `--output-format json`.
 */

export interface TableColumn<T> {
  header: string
  cell: (row: T) => string
  align?: 'left' | 'right'
  /** Longer cells are cut to this width, ending in an ellipsis */
  maxWidth?: number
}

const GUTTER = '  '

function clip(text: string, maxWidth: number | undefined): string {
  if (maxWidth === undefined || text.length <= maxWidth) return text
  return `${text.slice(0, Math.max(0, maxWidth - 1))}…`
}

/**
 * Render rows as aligned columns: a header line, a dashed rule under each
 * header, then one line per row. Trailing spaces are trimmed.
 */
export function formatTable<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  const body = rows.map((row) => columns.map((column) => clip(column.cell(row), column.maxWidth)))
  const widths = columns.map((column, i) =>
    body.reduce((width, line) => Math.max(width, line[i]?.length ?? 0), column.header.length),
  )

  const render = (line: string[]): string =>
    line
      .map((text, i) => {
        const width = widths[i] ?? text.length
        return columns[i]?.align === 'right' ? text.padStart(width) : text.padEnd(width)
      })
      .join(GUTTER)
      .trimEnd()

  return [
    render(columns.map((column) => column.header)),
    render(widths.map((width) => '-'.repeat(width))),
    ...body.map(render),
  ].join('\n')
}

/**
 * CLIJsonOutput wrapper type for machine-consumable JSON responses.
 */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the command was executed */
  timestamp: string
  /** Patchwarden version string */
  version: string
  /** The CLI command that was executed */
  command: string
  data: T
}

export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data,
  }
}
