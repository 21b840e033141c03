export interface DocumentSection {
  level: number; // 0 for text before the first heading
  heading: string | null;
  text: string;
}

const HEADING_PATTERN = /^(#{1,6})\s+(.*)$/;
const FENCE_PATTERN = /^(```|~~~)/;

/**
 * Splits Markdown into sections at ATX headings. Lines inside fenced code
 * blocks are never treated as headings.
 */
export function splitSections(markdown: string): DocumentSection[] {
  const sections: DocumentSection[] = [];
  let current: { level: number; heading: string | null; lines: string[] } = {
    level: 0,
    heading: null,
    lines: [],
  };
  let inFence = false;

  const flush = () => {
    const text = current.lines.join('\n').trim();
    if (current.heading !== null || text) {
      sections.push({ level: current.level, heading: current.heading, text });
    }
  };

  for (const line of markdown.split('\n')) {
    if (FENCE_PATTERN.test(line.trim())) {
      inFence = !inFence;
      current.lines.push(line);
      continue;
    }

    const match = inFence ? null : HEADING_PATTERN.exec(line.trim());
    if (match) {
      flush();
      current = {
        level: match[1].length,
        heading: match[2].replace(/\s+#+\s*$/, '').trim(),
        lines: [],
      };
      continue;
    }

    current.lines.push(line);
  }

  flush();
  return sections;
}
