export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

const SEPARATORS = [/\n\s*\n/, /(?<=[.!?])\s+/, /\s+/];

function splitOn(text: string, level: number): string[] {
  if (level >= SEPARATORS.length) {
    return [text];
  }
  return text
    .split(SEPARATORS[level])
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0);
}

/** Breaks text into pieces no longer than `limit`, trying paragraphs, then sentences, then words. */
function atomize(text: string, limit: number, level = 0): string[] {
  if (text.length <= limit) {
    return [text];
  }
  if (level >= SEPARATORS.length) {
    const pieces: string[] = [];
    for (let offset = 0; offset < text.length; offset += limit) {
      pieces.push(text.slice(offset, offset + limit));
    }
    return pieces;
  }
  return splitOn(text, level).flatMap((piece) => atomize(piece, limit, level + 1));
}

/**
 * Packs atoms into chunks of at most `chunkSize` characters. Consecutive chunks
 * share trailing atoms totalling at most `chunkOverlap` characters.
 */
export function chunkText(text: string, options: ChunkOptions): string[] {
  const { chunkSize, chunkOverlap } = options;
  const normalized = text.replace(/\r\n/g, '\n').trim();
  if (!normalized) {
    return [];
  }

  const atoms = atomize(normalized, chunkSize);
  const chunks: string[] = [];
  let window: string[] = [];
  let windowLength = 0;

  const joinedLength = (parts: string[]) => parts.reduce((sum, part) => sum + part.length, 0) + Math.max(parts.length - 1, 0);

  for (const atom of atoms) {
    const added = windowLength === 0 ? atom.length : windowLength + 1 + atom.length;
    if (added > chunkSize && window.length > 0) {
      chunks.push(window.join(' '));

      const carried: string[] = [];
      for (let index = window.length - 1; index >= 0; index -= 1) {
        const candidate = [window[index], ...carried];
        if (joinedLength(candidate) > chunkOverlap || joinedLength(candidate) + 1 + atom.length > chunkSize) {
          break;
        }
        carried.unshift(window[index]);
      }
      window = carried;
      windowLength = joinedLength(window);
    }

    window.push(atom);
    windowLength = joinedLength(window);
  }

  if (window.length > 0) {
    chunks.push(window.join(' '));
  }

  return chunks;
}
