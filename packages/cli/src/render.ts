import { getExitCode, type CLIErrorView } from '@polybench/core';

/**
 * Renders a presenter view as a labelled block for stderr:
 *
 *   ✖ Error E400: Invalid --delta value "abc". Expected an integer.
 *     setting: --delta
 *     value:   abc
 *     exit:    50
 *
 * Field values wrap under their own column; the title never wraps.
 */

const SGR = {
  reset: '\u001B[0m',
  bold: '\u001B[1m',
  dim: '\u001B[2m',
  red: '\u001B[31m',
} as const;

type Style = Exclude<keyof typeof SGR, 'reset'>;

const INDENT = '  ';
const LABEL_COLUMN = 'setting: '.length;
const HANG = INDENT.length + LABEL_COLUMN;
const MIN_ROOM = 10;

const LOCATION = /^(Location|Setting): (.+)$/;

function paint(text: string, enabled: boolean, ...styles: Style[]): string {
  if (!enabled) return text;
  return `${styles.map((style) => SGR[style]).join('')}${text}${SGR.reset}`;
}

function fill(text: string, room: number): string[] {
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/).filter((w) => w !== '')) {
    if (line !== '' && line.length + 1 + word.length > room) {
      lines.push(line);
      line = word;
    } else {
      line = line === '' ? word : `${line} ${word}`;
    }
  }
  if (line !== '') lines.push(line);
  return lines;
}

// "Setting: --delta" names a flag or option key, "Location: /matrix/0" a
// JSON pointer into an instance document.
function locationField(location: string): [string, string] {
  const match = LOCATION.exec(location);
  const value = match?.[2];
  if (value === undefined) return ['at', location];
  return [match?.[1] === 'Setting' ? 'setting' : 'at', value];
}

export function renderCLIView(view: CLIErrorView): string {
  const room = Math.max((view.terminalWidth || 80) - HANG, MIN_ROOM);
  const fields: Array<[string, string]> = [];
  if (view.location) fields.push(locationField(view.location));
  if (view.excerpt) fields.push(['value', view.excerpt]);
  if (view.workaround) fields.push(['hint', view.workaround]);
  fields.push(['exit', String(getExitCode(view.code))]);

  const lines = [paint(`✖ ${view.title}`, view.colors, 'bold', 'red')];
  for (const [label, value] of fields) {
    const head = paint(`${label}:`.padEnd(LABEL_COLUMN), view.colors, 'dim');
    fill(value, room).forEach((chunk, i) => {
      lines.push(
        i === 0 ? `${INDENT}${head}${chunk}` : `${' '.repeat(HANG)}${chunk}`
      );
    });
  }
  return lines.join('\n');
}

const SGR_SEQUENCE = /\u001B\[[\d;]*m/g; // eslint-disable-line no-control-regex

export function stripAnsi(input: string): string {
  return input.replace(SGR_SEQUENCE, '');
}
