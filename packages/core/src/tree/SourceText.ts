/**
 * SourceText - line index over the text a decorated tree was built from.
 *
 * Columns are UTF-16 code unit offsets from the start of the line, the same
 * unit the tree producer used for node ranges.
 */

import type { Position, SourceRange } from '@forkcov/types';
import { TreeShapeError } from '../errors/ForkcovError.js';

const WHITESPACE = /\s/;

export class SourceText {
  readonly text: string;
  /** Offset of the first character of each line */
  private readonly lineStarts: number[];

  constructor(text: string) {
    this.text = text;
    this.lineStarts = [0];
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') this.lineStarts.push(i + 1);
    }
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  offsetOf(position: Position): number {
    const lineStart = position.line >= 1 ? this.lineStarts[position.line - 1] : undefined;
    const offset = lineStart === undefined ? -1 : lineStart + position.column;
    if (offset < 0 || offset > this.text.length) {
      throw new TreeShapeError(
        `Position ${position.line}:${position.column} lies outside the source text`,
        'ERR_POSITION_OUT_OF_SOURCE',
        { line: position.line, column: position.column, lineCount: this.lineCount },
      );
    }
    return offset;
  }

  positionAt(offset: number): Position {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: offset - this.lineStarts[low] };
  }

  /**
   * Position right after `range`, past any whitespace and `#` comments that
   * follow it. Newlines count as whitespace.
   */
  skipToContentStart(range: SourceRange): Position {
    const text = this.text;
    let offset = this.offsetOf(range.end);

    for (;;) {
      while (offset < text.length && WHITESPACE.test(text[offset])) offset++;
      if (text[offset] !== '#') break;
      while (offset < text.length && text[offset] !== '\n') offset++;
    }

    return this.positionAt(offset);
  }
}
