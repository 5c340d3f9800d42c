export type Direction = 'up' | 'down' | 'left' | 'right';

export type Difficulty = 'easy' | 'medium' | 'hard' | 'insane';

export type Position = {
  row: number;
  col: number;
};

export type GameStatus = 'playing' | 'gameOver' | 'quit';

export type GameOverReason = 'wall' | 'self' | 'obstacle' | 'boardFull';

export type CollisionReason = Exclude<GameOverReason, 'boardFull'>;

export type DifficultySettings = {
  label: string;
  obstacleCount: number;
  moveIntervalMs: number;
};

/** Source of uniform numbers in [0, 1), swappable for deterministic tests. */
export type RandomSource = () => number;

export type Grid = {
  readonly height: number;
  readonly width: number;
  isWall: (pos: Position) => boolean;
  randomInterior: (random?: RandomSource) => Position;
  randomObstacleCell: (random?: RandomSource) => Position;
};

export type GameState = {
  readonly status: GameStatus;
  readonly reason: GameOverReason | null;
  readonly difficulty: Difficulty;
  readonly grid: Grid;
  readonly snake: readonly Position[];
  readonly direction: Direction;
  readonly food: Position;
  readonly obstacles: readonly Position[];
  readonly score: number;
};

export type StepResult = {
  snake: Position[];
  ateFood: boolean;
};

export type MoveSignal = 'forceMove' | 'quit' | null;

export type InputResolution = {
  direction: Direction;
  signal: MoveSignal;
};

export type TickResult = {
  moved: boolean;
  state: GameState;
};

/** Read-only view of a game for crash reports. */
export type GameSnapshot = {
  score: number;
  difficulty: Difficulty;
  snakeLength: number;
  head: Position;
  bodyPrefix: Position[];
  direction: Direction;
  moveIntervalMs: number;
  food: Position;
  obstacleCount: number;
  obstaclePrefix: Position[];
};
