import chalk from 'chalk';

/** 256-color purples, light to deep */
const GRADIENT = [141, 135, 129, 93, 57];

const ART = [
  ' ____  _                       ____                       ',
  '|  _ \\| |__   ___  _ __   ___/ ___|  ___ ___  _ __   ___ ',
  '| |_) | \'_ \\ / _ \\| \'_ \\ / _ \\___ \\ / __/ _ \\| \'_ \\ / _ \\',
  '|  __/| | | | (_) | | | |  __/___) | (_| (_) | |_) |  __/',
  '|_|   |_| |_|\\___/|_| |_|\\___|____/ \\___\\___/| .__/ \\___|',
  '                                             |_|         ',
];

const TAGLINES = [
  '🔍 Offline phone number intelligence',
  '📱 Formats • Validation • Location • Carrier • Timezones',
];

/**
 * Startup banner, shaded top to bottom when colors are on.
 */
export function renderBanner(colors: boolean): string {
  const lines = ART.map((line, index) => {
    if (!colors) return line;
    const shade = GRADIENT[Math.min(index, GRADIENT.length - 1)];
    return chalk.bold.ansi256(shade)(line);
  });
  lines.push('');
  for (const tagline of TAGLINES) {
    lines.push(colors ? chalk.cyan(tagline) : tagline);
  }
  return lines.join('\n');
}
