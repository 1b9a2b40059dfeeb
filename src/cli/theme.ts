/**
 * submission-grader CLI theme
 * Shared colors, icons and formatters for console output
 */

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',

  brightBlack: '\x1b[90m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
  brightYellow: '\x1b[93m',
};

export const style = {
  bold: (text: string) => `${colors.bold}${text}${colors.reset}`,
  dim: (text: string) => `${colors.dim}${text}${colors.reset}`,

  success: (text: string) => `${colors.green}${text}${colors.reset}`,
  error: (text: string) => `${colors.red}${text}${colors.reset}`,
  warning: (text: string) => `${colors.yellow}${text}${colors.reset}`,
  muted: (text: string) => `${colors.brightBlack}${text}${colors.reset}`,

  primary: (text: string) => `${colors.brightCyan}${text}${colors.reset}`,
  accent: (text: string) => `${colors.brightMagenta}${text}${colors.reset}`,

  command: (text: string) => `${colors.bold}${colors.cyan}${text}${colors.reset}`,
  path: (text: string) => `${colors.brightBlue}${text}${colors.reset}`,
  number: (text: string) => `${colors.brightYellow}${text}${colors.reset}`,
  label: (text: string) => `${colors.dim}${text}${colors.reset}`,
};

export const icons = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  arrowRight: '▸',
  folder: '📁',
  file: '📄',
  magnify: '🔍',
  brain: '🧠',
};

export const box = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│',
  dHorizontal: '═',
};

export const BANNER_MINIMAL = `${style.accent('submission-grader')} ${style.muted('·')} ${style.dim('rubric-driven grading of zipped submissions')}`;

export function header(title: string): string {
  const width = 60;
  return `\n${style.primary(box.dHorizontal.repeat(width))}
${style.bold(title)}
${style.primary(box.dHorizontal.repeat(width))}\n`;
}

export function subheader(title: string): string {
  return `\n${style.bold(title)}\n${style.dim(box.horizontal.repeat(40))}`;
}

export function keyValue(key: string, value: string | number, indent = 0): string {
  const pad = '  '.repeat(indent);
  return `${pad}${style.label(key + ':')} ${value}`;
}

/** Green from 7, yellow from 4, red below. */
export function colorScore(score: number, text: string): string {
  if (score >= 7) return style.success(text);
  if (score >= 4) return style.warning(text);
  return style.error(text);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

// Visible width, ignoring ANSI escapes
function visibleLength(text: string): number {
  return text.replace(/\x1b\[[0-9;]*m/g, '').length;
}

export function summaryBox(title: string, rows: Array<[string, string]>): string {
  const inner = 38;
  const line = (content: string) =>
    style.primary(`  ${box.vertical}`) +
    content +
    ' '.repeat(Math.max(0, inner - visibleLength(content))) +
    style.primary(box.vertical);

  const lines: string[] = [];
  lines.push(style.primary(`  ${box.topLeft}${box.horizontal.repeat(inner)}${box.topRight}`));
  lines.push(line(''));
  lines.push(line(`   ${style.bold(title)}`));
  lines.push(line(''));
  for (const [label, value] of rows) {
    lines.push(line(`   ${label.padEnd(20)}${value}`));
  }
  lines.push(line(''));
  lines.push(style.primary(`  ${box.bottomLeft}${box.horizontal.repeat(inner)}${box.bottomRight}`));
  return lines.join('\n');
}

// Error formatting with suggestions
export function formatError(message: string, suggestions?: string[]): string {
  const lines: string[] = [];
  lines.push(`\n${style.error(`${icons.error} Error:`)} ${message}`);

  if (suggestions && suggestions.length > 0) {
    lines.push('');
    lines.push(style.dim('  Suggestions:'));
    for (const suggestion of suggestions) {
      lines.push(`    ${style.dim(icons.arrowRight)} ${suggestion}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}
