import type { ChalkInstance } from 'chalk';
import type { RefineRegion } from '@hunkwise/diff';

export class DiffRenderer {
  constructor(private readonly chalk: ChalkInstance) {}

  /** Style for a diff line, chosen by its leading characters. */
  private styleOf(line: string): ChalkInstance | null {
    const { chalk } = this;
    if (line.startsWith('+++ ') || line.startsWith('--- ') || line.startsWith('diff ')) return chalk.bold;
    if (line.startsWith('@@') || line.startsWith('*** ')) return chalk.cyan;
    if (line.startsWith('***************')) return chalk.cyan;
    if (line.startsWith('+') || line.startsWith('>')) return chalk.green;
    if (line.startsWith('-') || line.startsWith('<')) return chalk.red;
    if (line.startsWith('!')) return chalk.yellow;
    return null;
  }

  colorLine(line: string): string {
    const style = this.styleOf(line);
    return style ? style(line) : line;
  }

  render(text: string): string {
    return text
      .split('\n')
      .map((line) => this.colorLine(line))
      .join('\n');
  }

  /**
   * Colour `text` and show the refinement regions inverted. Regions are
   * offsets into `text`, sorted by start.
   */
  renderRefined(text: string, regions: RefineRegion[]): string {
    const out: string[] = [];
    let lineStart = 0;
    let next = 0;

    for (const line of text.split('\n')) {
      const lineEnd = lineStart + line.length;
      while (next < regions.length && regions[next].end <= lineStart) next++;

      let pieces = '';
      let pos = lineStart;
      for (let i = next; i < regions.length && regions[i].start < lineEnd; i++) {
        const start = Math.max(regions[i].start, pos);
        const end = Math.min(regions[i].end, lineEnd);
        if (end <= start) continue;
        pieces += text.slice(pos, start) + this.chalk.inverse(text.slice(start, end));
        pos = end;
      }
      pieces += text.slice(pos, lineEnd);

      const style = this.styleOf(line);
      out.push(style ? style(pieces) : pieces);
      lineStart = lineEnd + 1;
    }
    return out.join('\n');
  }
}
