/**
 * Deterministic identicon-style SVG avatars. The same name always yields the
 * same bytes.
 */

const GRID = 5;
const CELL = 60;

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function renderAvatarSvg(name: string): string {
  const hash = fnv1a(name);
  const hue = hash % 360;
  const fill = `hsl(${hue}, 55%, 50%)`;
  const size = GRID * CELL;

  const cells: string[] = [];
  // Mirror the left three columns onto the right two.
  for (let row = 0; row < GRID; row++) {
    for (let col = 0; col < Math.ceil(GRID / 2); col++) {
      const bit = (hash >>> (row * 3 + col)) & 1;
      if (bit === 0) continue;
      const mirrored = GRID - 1 - col;
      cells.push(`<rect x="${col * CELL}" y="${row * CELL}" width="${CELL}" height="${CELL}" fill="${fill}"/>`);
      if (mirrored !== col) {
        cells.push(`<rect x="${mirrored * CELL}" y="${row * CELL}" width="${CELL}" height="${CELL}" fill="${fill}"/>`);
      }
    }
  }

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}" viewBox="0 0 ${size} ${size}">`,
    `<rect width="${size}" height="${size}" fill="#f2f2f2"/>`,
    ...cells,
    '</svg>',
    '',
  ].join('\n');
}
