/**
 * Console formatting helpers for benchmark output.
 */

// ─── ANSI Colors ────────────────────────────────────────────────────────────

export const Colors = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
} as const;

export function colorize(text: string, color: string): string {
  return `${color}${text}${Colors.reset}`;
}

// ─── Numbers ────────────────────────────────────────────────────────────────

export function fmt(n: number): string {
  return n.toLocaleString("en-US");
}

export function fmtMs(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(2)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

export function fmtBytes(bytes: number): string {
  if (Math.abs(bytes) < 1024) return `${bytes}B`;
  if (Math.abs(bytes) < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

// ─── Layout ─────────────────────────────────────────────────────────────────

const BOX_WIDTH = 72;
const COL_WIDTH = 14;

export function header(title: string): void {
  const pad = Math.max(0, BOX_WIDTH - title.length);
  const left = Math.floor(pad / 2);
  console.log(colorize(`  ╔${"═".repeat(BOX_WIDTH)}╗`, Colors.cyan));
  console.log(
    colorize(
      `  ║${" ".repeat(left)}${title}${" ".repeat(pad - left)}║`,
      Colors.cyan,
    ),
  );
  console.log(colorize(`  ╚${"═".repeat(BOX_WIDTH)}╝`, Colors.cyan));
}

export function sectionTitle(num: string, title: string): void {
  console.log(colorize(`  ┌─ ${num}. ${title}`, Colors.cyan));
}

export function sparkBar(filled: number, total: number): string {
  const bar = "█".repeat(filled) + "░".repeat(Math.max(0, total - filled));
  return colorize(bar, Colors.green);
}

function padCell(text: string): string {
  // ANSI codes take no columns
  const visible = text.replace(/\x1b\[[0-9;]*m/g, "");
  return text + " ".repeat(Math.max(0, COL_WIDTH - visible.length));
}

export function tableHeader(cols: string[]): void {
  console.log(`  │ ${cols.map((c) => colorize(padCell(c), Colors.dim)).join("│ ")}`);
  const line = cols.map(() => "─".repeat(COL_WIDTH)).join("┼─");
  console.log(colorize(`  │ ${line}`, Colors.dim));
}

export function tableRow(cols: string[]): void {
  console.log(`  │ ${cols.map(padCell).join("│ ")}`);
}

export function tableDivider(): void {
  console.log(colorize(`  └${"─".repeat(BOX_WIDTH - 1)}`, Colors.dim));
}
