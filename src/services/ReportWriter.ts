// src/services/ReportWriter.ts
import ExcelJS from 'exceljs';
import fs from 'fs-extra';
import path from 'node:path';

export type Cell = string | number | boolean | null | undefined;

export interface Table {
  /** Sheet name in workbooks. */
  name: string;
  columns: string[];
  rows: Cell[][];
}

export type ChartType = 'line' | 'bar';

export const CHART_TYPES: readonly ChartType[] = ['line', 'bar'];

export interface ChartSeries {
  name: string;
  /** Aligned with ChartSpec.x; null marks a missing point. */
  values: Array<number | null>;
}

export interface ChartSpec {
  title: string;
  type: ChartType;
  xLabel: string;
  yLabel: string;
  x: number[];
  series: ChartSeries[];
}

/* -------------------------------------------------------------------------------------------------
 * CSV / JSON
 * ------------------------------------------------------------------------------------------------- */

function csvCell(v: Cell): string {
  if (v === null || v === undefined) return '';
  if (typeof v === 'number') return Number.isFinite(v) ? String(v) : '';
  const s = String(v);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function toCsv(table: Pick<Table, 'columns' | 'rows'>): string {
  const lines = [table.columns.map(csvCell).join(',')];
  for (const r of table.rows) lines.push(r.map(csvCell).join(','));
  return lines.join('\n') + '\n';
}

export async function writeCsv(filePath: string, table: Pick<Table, 'columns' | 'rows'>) {
  await fs.ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, toCsv(table), 'utf8');
  return filePath;
}

export async function writeJson(filePath: string, data: unknown) {
  await fs.ensureDir(path.dirname(filePath));
  await fs.writeJSON(filePath, data, { spaces: 2 });
  return filePath;
}

/* -------------------------------------------------------------------------------------------------
 * XLSX
 * ------------------------------------------------------------------------------------------------- */

// Excel: at most 31 characters, none of []:*?/\
function sheetName(raw: string, taken: Set<string>): string {
  const base = raw.replace(/[[\]:*?/\\]/g, '_').slice(0, 31) || 'Sheet';
  let name = base;
  for (let i = 2; taken.has(name.toLowerCase()); i++) {
    const suffix = `_${i}`;
    name = base.slice(0, 31 - suffix.length) + suffix;
  }
  taken.add(name.toLowerCase());
  return name;
}

export async function writeWorkbook(
  filePath: string,
  tables: Table[],
  meta: Record<string, string | number> = {},
) {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'sweep-lab';
  workbook.created = new Date();
  const taken = new Set<string>();

  const metaEntries = Object.entries(meta);
  if (metaEntries.length) {
    const ws = workbook.addWorksheet(sheetName('Meta', taken));
    ws.columns = [
      { header: 'Key', key: 'k', width: 28 },
      { header: 'Value', key: 'v', width: 60 },
    ];
    for (const [k, v] of metaEntries) ws.addRow({ k, v });
  }

  for (const t of tables) {
    const ws = workbook.addWorksheet(sheetName(t.name, taken));
    ws.columns = t.columns.map(c => ({
      header: c,
      key: c,
      width: Math.max(12, c.length + 2),
    }));
    for (const r of t.rows) {
      ws.addRow(r.map(v => (typeof v === 'number' && !Number.isFinite(v) ? null : v ?? null)));
    }
  }

  await fs.ensureDir(path.dirname(filePath));
  await workbook.xlsx.writeFile(filePath);
  return filePath;
}

/* -------------------------------------------------------------------------------------------------
 * Charts (Mermaid xychart-beta)
 * ------------------------------------------------------------------------------------------------- */

const fmt = (n: number) => (Number.isInteger(n) ? String(n) : String(Number(n.toPrecision(6))));
const quote = (s: string) => `"${s.replace(/"/g, "'")}"`;

/**
 * Renders one chart as a fenced Mermaid block followed by a legend. Mermaid cannot draw
 * gaps, so a missing point is plotted as 0 and listed under the legend.
 */
export function renderChart(spec: ChartSpec): string {
  const out: string[] = ['```mermaid', 'xychart-beta'];
  out.push(`    title ${quote(spec.title)}`);
  out.push(`    x-axis ${quote(spec.xLabel)} [${spec.x.map(fmt).join(', ')}]`);
  out.push(`    y-axis ${quote(spec.yLabel)}`);
  for (const s of spec.series) {
    out.push(`    ${spec.type} [${s.values.map(v => (v === null ? '0' : fmt(v))).join(', ')}]`);
  }
  out.push('```', '');
  out.push(`Series (in drawing order): ${spec.series.map(s => s.name).join(', ')}`);
  const gaps = spec.series
    .map(s => ({
      name: s.name,
      at: s.values.flatMap((v, i) => (v === null ? [spec.x[i]] : [])),
    }))
    .filter(g => g.at.length);
  if (gaps.length) out.push('');
  for (const g of gaps) out.push(`- no data for ${g.name} at ${g.at.map(fmt).join(', ')}`);
  return out.join('\n') + '\n';
}

export async function writeChartsMarkdown(
  filePath: string,
  title: string,
  charts: ChartSpec[],
) {
  const parts = [`# ${title}`, ''];
  for (const c of charts) {
    parts.push(`## ${c.title}`, '', renderChart(c));
  }
  if (!charts.length) parts.push('_No chartable data._', '');
  await fs.ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, parts.join('\n'), 'utf8');
  return filePath;
}
