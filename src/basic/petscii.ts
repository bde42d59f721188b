/**
 * PETSCII → text
 *
 * strict: shifted space and the shared printable range only, everything
 *         else becomes "." (control and graphics codes)
 * layout: also renders cursor movement as spacing, drops reverse-on and
 *         reads shifted letters as capitals; meant for strings in listings
 */

export type PetsciiMode = 'strict' | 'layout';

const SHIFTED_SPACE = 0xA0;
const UNPRINTABLE = '.';

// cursor down / right / left
const LAYOUT_SPACING = new Set([0x11, 0x1D, 0x9D]);
// reverse on
const LAYOUT_IGNORED = new Set([0x90]);

export function petsciiToText(byte: number, mode: PetsciiMode = 'strict'): string {
  if (byte === SHIFTED_SPACE) return ' ';
  if (mode === 'layout') {
    if (LAYOUT_SPACING.has(byte)) return ' ';
    if (LAYOUT_IGNORED.has(byte)) return '';
    if (byte >= 0xC1 && byte <= 0xDA) return String.fromCharCode(byte - 0xC1 + 0x41);
  }
  if (byte >= 32 && byte <= 126) return String.fromCharCode(byte);
  return UNPRINTABLE;
}
