/**
 * Classification of hunk body lines
 */

export type HunkStyle = 'unified' | 'context' | 'normal';

export type LineKind = 'context' | 'added' | 'removed' | 'changed' | 'no-newline' | 'other';

export interface ClassifyOptions {
  /** Treat an empty line as a context line whose leading space was lost */
  emptyIsContext?: boolean;
}

/**
 * Classify one body line by its leading character. Without a style the
 * unified/context prefix characters are accepted together.
 */
export function classifyLine(line: string, style?: HunkStyle, options: ClassifyOptions = {}): LineKind {
  if (line === '') {
    return style === 'unified' && options.emptyIsContext ? 'context' : 'other';
  }

  if (style === 'normal') {
    switch (line[0]) {
      case '<':
        return 'removed';
      case '>':
        return 'added';
      case '\\':
        return 'no-newline';
      default:
        return 'other';
    }
  }

  switch (line[0]) {
    case ' ':
      return 'context';
    case '+':
      return 'added';
    case '-':
      return 'removed';
    case '!':
      return style === 'unified' ? 'other' : 'changed';
    case '\\':
      return 'no-newline';
    default:
      return 'other';
  }
}

/** Number of prefix characters in front of each body line. */
export function prefixWidth(style: HunkStyle): number {
  return style === 'unified' ? 1 : 2;
}

export function isOldSide(kind: LineKind): boolean {
  return kind === 'context' || kind === 'removed' || kind === 'changed';
}

export function isNewSide(kind: LineKind): boolean {
  return kind === 'context' || kind === 'added' || kind === 'changed';
}
