import type { CLIErrorView } from '@nsmap/core';

type Style = 'title' | 'kept' | 'rejected';

const STYLES: Record<Style, string> = {
  title: '\u001B[1;31m',
  kept: '\u001B[32m',
  rejected: '\u001B[31m',
};
const RESET = '\u001B[0m';

function paint(text: string, style: Style, enabled: boolean): string {
  return enabled ? `${STYLES[style]}${text}${RESET}` : text;
}

/**
 * Wrap `text` after `label` at `width` columns; continuation lines are
 * indented to sit under the first word.
 */
function wrapLabelled(label: string, text: string, width: number): string {
  const indent = ' '.repeat(label.length + 1);
  const lines: string[] = [];
  let line = label;
  let hasWord = false;
  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    if (hasWord && line.length + 1 + word.length > width) {
      lines.push(line);
      line = indent + word;
    } else {
      line = `${line} ${word}`;
    }
    hasWord = true;
  }
  lines.push(line);
  return lines.join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines = [paint(view.title, 'title', view.colors)];

  if (view.conflict) {
    const { prefix, existing, incoming } = view.conflict;
    lines.push(paint(`  ${prefix} = ${existing} (kept)`, 'kept', view.colors));
    lines.push(
      paint(`  ${prefix} = ${incoming} (rejected)`, 'rejected', view.colors)
    );
  }
  if (view.location) {
    lines.push(wrapLabelled('at', view.location, width));
  }
  if (view.workaround) {
    lines.push(wrapLabelled('hint:', view.workaround, width));
  }
  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  // eslint-disable-next-line no-control-regex
  const ansiRe = /\u001B\[[0-9;]*m/g;
  return input.replace(ansiRe, '');
}
