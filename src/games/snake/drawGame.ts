import { type Renderer } from '../../terminal/BufferedScreen';
import { centerColumn, truncate } from '../../utils/text';
import { DIFFICULTY_SETTINGS, GLYPHS, INSTRUCTIONS } from './constants';
import { type GameState } from './types';

type Canvas = Pick<Renderer, 'drawCell' | 'drawText'>;

function drawBorder(canvas: Canvas, height: number, width: number): void {
  for (let col = 1; col < width - 1; col++) {
    canvas.drawCell({ row: 0, col }, GLYPHS.horizontal);
    canvas.drawCell({ row: height - 1, col }, GLYPHS.horizontal);
  }
  for (let row = 1; row < height - 1; row++) {
    canvas.drawCell({ row, col: 0 }, GLYPHS.vertical);
    canvas.drawCell({ row, col: width - 1 }, GLYPHS.vertical);
  }
  canvas.drawCell({ row: 0, col: 0 }, GLYPHS.topLeft);
  canvas.drawCell({ row: 0, col: width - 1 }, GLYPHS.topRight);
  canvas.drawCell({ row: height - 1, col: 0 }, GLYPHS.bottomLeft);
  canvas.drawCell({ row: height - 1, col: width - 1 }, GLYPHS.bottomRight);
}

export function drawGame(canvas: Canvas, state: GameState): void {
  const { height, width } = state.grid;

  drawBorder(canvas, height, width);

  state.obstacles.forEach((obstacle) => canvas.drawCell(obstacle, GLYPHS.obstacle));
  canvas.drawCell(state.food, GLYPHS.food);

  // Body first so the head wins if it overlaps on the losing move
  state.snake.forEach((segment, index) => {
    if (index > 0) canvas.drawCell(segment, GLYPHS.body);
  });
  canvas.drawCell(state.snake[0], GLYPHS.head);

  const scoreText = `Score: ${state.score}`;
  canvas.drawText({ row: 0, col: 2 }, scoreText);

  // Right-aligned, but never over the score or the corner
  const difficultyText = `Difficulty: ${DIFFICULTY_SETTINGS[state.difficulty].label}`;
  const difficultyCol = Math.max(width - difficultyText.length - 2, 2 + scoreText.length + 1);
  canvas.drawText(
    { row: 0, col: difficultyCol },
    truncate(difficultyText, width - 1 - difficultyCol)
  );
  canvas.drawText({ row: height - 1, col: 2 }, truncate(INSTRUCTIONS, width - 4));
}

export function drawGameOver(canvas: Canvas, state: GameState, prompt: string): void {
  const { height, width } = state.grid;
  const middle = Math.floor(height / 2);
  const lines = ['GAME OVER!', `Final Score: ${state.score}`, prompt];

  drawBorder(canvas, height, width);
  lines.forEach((line, index) => {
    const text = truncate(line, width - 2);
    canvas.drawText({ row: middle - 1 + index, col: centerColumn(width, text) }, text);
  });
}
