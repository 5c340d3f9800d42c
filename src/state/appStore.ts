import { create } from 'zustand';
import { type SnakeGame } from '../games/snake/SnakeGame';
import { type Difficulty, type GameState } from '../games/snake/types';
import { emptyLeaderboard, isHighScore, type Leaderboard } from '../leaderboard/leaderboard';

export type Screen =
  | { name: 'menu' }
  | { name: 'playing'; game: SnakeGame }
  | { name: 'setupError'; message: string }
  | { name: 'gameOver'; result: GameState; highScore: boolean }
  | { name: 'nameEntry'; difficulty: Difficulty; score: number }
  | { name: 'leaderboard'; difficulty: Difficulty };

type AppStore = {
  screen: Screen;
  leaderboard: Leaderboard;
  lastScore: number;
  setLeaderboard: (board: Leaderboard) => void;
  startGame: (game: SnakeGame) => void;
  showSetupError: (message: string) => void;
  finishGame: (result: GameState) => void;
  continueFromGameOver: () => void;
  showLeaderboard: (difficulty: Difficulty) => void;
  backToMenu: () => void;
};

export const useAppStore = create<AppStore>((set, get) => ({
  screen: { name: 'menu' },
  leaderboard: emptyLeaderboard(),
  lastScore: 0,
  setLeaderboard: (leaderboard) => set({ leaderboard }),
  startGame: (game) => set({ screen: { name: 'playing', game } }),
  showSetupError: (message) => set({ screen: { name: 'setupError', message } }),
  finishGame: (result) =>
    set({
      lastScore: result.score,
      screen: {
        name: 'gameOver',
        result,
        highScore: isHighScore(result.score, result.difficulty, get().leaderboard),
      },
    }),
  continueFromGameOver: () => {
    const { screen } = get();
    if (screen.name !== 'gameOver') return;
    const { difficulty, score } = screen.result;
    set({
      screen: screen.highScore
        ? { name: 'nameEntry', difficulty, score }
        : { name: 'leaderboard', difficulty },
    });
  },
  showLeaderboard: (difficulty) => set({ screen: { name: 'leaderboard', difficulty } }),
  backToMenu: () => set({ screen: { name: 'menu' } }),
}));
