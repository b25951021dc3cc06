/**
 * ASCII Banner
 *
 * The ENGRAM block-letter banner inside a box border.
 */

import { c, stripColors } from './colors';

const ENGRAM_ASCII = [
  '███████╗███╗   ██╗ ██████╗ ██████╗  █████╗ ███╗   ███╗',
  '██╔════╝████╗  ██║██╔════╝ ██╔══██╗██╔══██╗████╗ ████║',
  '█████╗  ██╔██╗ ██║██║  ███╗██████╔╝███████║██╔████╔██║',
  '██╔══╝  ██║╚██╗██║██║   ██║██╔══██╗██╔══██║██║╚██╔╝██║',
  '███████╗██║ ╚████║╚██████╔╝██║  ██║██║  ██║██║ ╚═╝ ██║',
  '╚══════╝╚═╝  ╚═══╝ ╚═════╝ ╚═╝  ╚═╝╚═╝  ╚═╝╚═╝     ╚═╝'
];

const TAGLINE = 'Entries in, entities out';

/** Banner dimensions */
const BANNER_WIDTH = 72;
const CONTENT_WIDTH = BANNER_WIDTH - 4; // Account for borders and padding

/**
 * Center text within the content width, measuring visible characters only.
 */
function center(text: string): string {
  const padding = Math.max(0, CONTENT_WIDTH - stripColors(text).length);
  const left = Math.floor(padding / 2);
  return ' '.repeat(left) + text + ' '.repeat(padding - left);
}

function bordered(content: string): string {
  return `${c.white('║')} ${content} ${c.white('║')}`;
}

/**
 * Generate the complete banner.
 * Block characters are dimmed, outline characters stay white.
 */
export function generateBanner(): string {
  const rule = '═'.repeat(BANNER_WIDTH - 2);
  const blank = bordered(' '.repeat(CONTENT_WIDTH));

  const art = ENGRAM_ASCII.map((line) =>
    bordered(center(line.replace(/█+/g, (block) => c.dim(block))))
  );

  return [
    c.white(`╔${rule}╗`),
    blank,
    ...art,
    blank,
    bordered(center(c.dim(TAGLINE))),
    blank,
    c.white(`╚${rule}╝`)
  ].join('\n');
}

/**
 * Display the banner to the console.
 */
export function displayBanner(): void {
  console.log(generateBanner());
}
