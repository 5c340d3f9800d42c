import { type Position } from '../games/snake/types';
import { type Key } from './keys';

export type Renderer = {
  drawCell: (pos: Position, glyph: string) => void;
  drawText: (pos: Position, text: string) => void;
  pollKey: () => Key | undefined;
};

/**
 * Character frame plus a one-slot key buffer. A key pushed before the previous
 * one was polled replaces it, so only the latest press counts for a tick.
 */
export class BufferedScreen implements Renderer {
  readonly height: number;
  readonly width: number;
  private cells: string[][];
  private pendingKey: Key | undefined;

  constructor(height: number, width: number) {
    this.height = height;
    this.width = width;
    this.cells = BufferedScreen.blank(height, width);
  }

  private static blank(height: number, width: number): string[][] {
    return Array.from({ length: height }, () => Array<string>(width).fill(' '));
  }

  clear(): void {
    this.cells = BufferedScreen.blank(this.height, this.width);
  }

  drawCell(pos: Position, glyph: string): void {
    const row = this.cells[pos.row];
    if (!row || pos.col < 0 || pos.col >= this.width) return;
    row[pos.col] = glyph;
  }

  drawText(pos: Position, text: string): void {
    Array.from(text).forEach((char, offset) => {
      this.drawCell({ row: pos.row, col: pos.col + offset }, char);
    });
  }

  pushKey(key: Key): void {
    this.pendingKey = key;
  }

  pollKey(): Key | undefined {
    const key = this.pendingKey;
    this.pendingKey = undefined;
    return key;
  }

  lines(): string[] {
    return this.cells.map((row) => row.join(''));
  }
}
