import chalk from 'chalk';

export type Palette = {
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  bold: (s: string) => string;
};

export type Style = 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title';

export function getPalette(noColor: boolean, theme: string = process.env.CLI_THEME || 'neo'): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  if (theme.toLowerCase() === 'mono') {
    return { info: c.white, success: c.white, warn: c.white, error: c.white, dim: c.gray, bold: c.bold };
  }
  return { info: c.cyan, success: c.green, warn: c.yellow, error: c.red, dim: c.gray, bold: c.bold };
}

function defaultNoColor(): boolean {
  return !!process.env.NO_COLOR || process.argv.includes('--no-color') || !process.stdout.isTTY;
}

export type Ui = {
  say(msg: string, style?: Style): void;
  table(rows: Array<Record<string, string | number>>): void;
};

export function createUi(write: (line: string) => void = (line) => console.log(line), noColor = defaultNoColor()): Ui {
  const palette = getPalette(noColor);

  function say(msg: string, style: Style = 'info'): void {
    switch (style) {
      case 'success': write(palette.success(`✔ ${msg}`)); break;
      case 'warn': write(palette.warn(`⚠ ${msg}`)); break;
      case 'error': write(palette.error(`✖ ${msg}`)); break;
      case 'dim': write(palette.dim(msg)); break;
      case 'title': write(palette.bold(palette.info(msg))); break;
      default: write(palette.info(msg)); break;
    }
  }

  function table(rows: Array<Record<string, string | number>>): void {
    if (rows.length === 0) {
      write('(none)');
      return;
    }
    const headers = Object.keys(rows[0]);
    const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
    write(headers.map((h, i) => palette.bold(h.padEnd(widths[i]))).join('  '));
    for (const r of rows) {
      write(headers.map((h, i) => String(r[h] ?? '').padEnd(widths[i])).join('  ').trimEnd());
    }
  }

  return { say, table };
}
