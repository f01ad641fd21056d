import { describe, it, expect } from 'vitest';
import { renderCLIView, stripAnsi } from './render.js';
import type { CLIErrorView } from '@polybench/core';
import { ErrorCode } from '@polybench/core';

describe('renderCLIView', () => {
  it('lists the setting, value, hint and exit code under the title', () => {
    const view: CLIErrorView = {
      title: 'Error E001: Difficulty must be a positive integer, got 0',
      code: ErrorCode.INVALID_DIFFICULTY,
      location: 'Setting: --delta',
      excerpt: '0',
      workaround: 'Pass --delta 1 or more',
      colors: false,
      terminalWidth: 80,
    };

    expect(renderCLIView(view).split('\n')).toEqual([
      '✖ Error E001: Difficulty must be a positive integer, got 0',
      '  setting: --delta',
      '  value:   0',
      '  hint:    Pass --delta 1 or more',
      '  exit:    10',
    ]);
  });

  it('labels a document pointer apart from a setting', () => {
    const view: CLIErrorView = {
      title: 'Error E200: Row 0 does not sum to its budget',
      code: ErrorCode.INVARIANT_VIOLATION,
      location: 'Location: /matrix/0',
      colors: false,
      terminalWidth: 80,
    };

    expect(renderCLIView(view).split('\n')).toEqual([
      '✖ Error E200: Row 0 does not sum to its budget',
      '  at:      /matrix/0',
      '  exit:    30',
    ]);
  });

  it('applies ANSI colors when enabled', () => {
    const view: CLIErrorView = {
      title: 'Error E500: Internal error',
      code: ErrorCode.INTERNAL_ERROR,
      colors: true,
      terminalWidth: 80,
    };
    const out = renderCLIView(view);
    expect(out.split('\n')[0]).toBe(
      '\u001B[1m\u001B[31m✖ Error E500: Internal error\u001B[0m'
    );
    expect(stripAnsi(out)).toBe(
      '✖ Error E500: Internal error\n  exit:    99'
    );
  });

  it('wraps field values under their column but never the title', () => {
    const view: CLIErrorView = {
      title: 'Error E400: Invalid --delta value "abc". Expected an integer.',
      code: ErrorCode.PARSE_ERROR,
      location: 'Setting: --delta',
      excerpt: 'abc',
      workaround: 'Pass a positive integer difficulty',
      colors: false,
      terminalWidth: 30,
    };
    expect(renderCLIView(view)).toBe(
      [
        '✖ Error E400: Invalid --delta value "abc". Expected an integer.',
        '  setting: --delta',
        '  value:   abc',
        '  hint:    Pass a positive',
        '           integer difficulty',
        '  exit:    50',
      ].join('\n')
    );
  });
});
