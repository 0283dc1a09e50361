import { advanceRound, createRound } from '../game/round';
import {
  NOT_STARTED_TEXT,
  renderBoard,
  renderCaught,
  renderLevelUp,
  renderTimeUp,
  renderWelcome,
} from '../game/render';
import { createMathRng, type GameRng } from '../game/rng';
import { SessionRegistry, type RoundStore } from '../game/sessionRegistry';
import { isTerminalStep } from '../game/types';
import type { LeaderboardRow } from '../../../shared/src/protocol';
import type { ScoreLedger } from './scoreLedger';

export const LEADERBOARD_UNAVAILABLE_TEXT = 'Leaderboard is unavailable right now.';

export type GameServiceOptions = {
  ledger: ScoreLedger;
  roundStore?: RoundStore;
  rng?: GameRng;
  now?: () => number;
};

/**
 * Inbound surface for chat and HTTP adapters: everything goes in as a session
 * key plus a command and comes back as plain text.
 */
export class GameService {
  readonly registry: SessionRegistry;
  private readonly ledger: ScoreLedger;
  private readonly rng: GameRng;
  private readonly now: () => number;

  constructor(options: GameServiceOptions) {
    this.ledger = options.ledger;
    this.rng = options.rng ?? createMathRng();
    this.now = options.now ?? Date.now;
    this.registry = new SessionRegistry(
      (ownerId, ownerLabel) => createRound({ ownerId, ownerLabel, nowMs: this.now(), rng: this.rng }),
      options.roundStore,
    );
  }

  startRound(sessionKey: string, ownerId: string, ownerLabel: string): Promise<string> {
    return this.registry.runExclusive(sessionKey, () => {
      const state = this.registry.create(sessionKey, ownerId, ownerLabel);
      // eslint-disable-next-line no-console
      console.log('[game] round started', { sessionKey, ownerId });
      return renderWelcome(state, this.now());
    });
  }

  processMove(sessionKey: string, direction: string): Promise<string> {
    return this.registry.runExclusive(sessionKey, async () => {
      const state = this.registry.get(sessionKey);
      if (!state) return NOT_STARTED_TEXT;

      const nowMs = this.now();
      const step = advanceRound(state, direction, { nowMs, rng: this.rng });

      if (step.kind === 'level_up') {
        // eslint-disable-next-line no-console
        console.log('[game] level up', { sessionKey, level: step.level });
        return renderLevelUp(state, nowMs);
      }

      if (isTerminalStep(step)) {
        this.registry.remove(sessionKey);
        // eslint-disable-next-line no-console
        console.log('[game] round over', { sessionKey, reason: step.kind, score: step.finalScore });
        await this.recordFinalScore(state.ownerId, state.ownerLabel, step.finalScore);
        return step.kind === 'caught' ? renderCaught(step.finalScore) : renderTimeUp(step.finalScore);
      }

      return renderBoard(state, nowMs);
    });
  }

  async getLeaderboard(limit?: number): Promise<LeaderboardRow[]> {
    return this.ledger.list(limit);
  }

  async getLeaderboardText(limit?: number): Promise<string> {
    try {
      return await this.ledger.render(limit);
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error('[ledger] failed to load leaderboard', error);
      return LEADERBOARD_UNAVAILABLE_TEXT;
    }
  }

  private async recordFinalScore(ownerId: string, ownerLabel: string, score: number): Promise<void> {
    try {
      const improved = await this.ledger.record(ownerId, ownerLabel, score);
      if (improved) {
        // eslint-disable-next-line no-console
        console.log('[ledger] new best score', { ownerId, score });
      }
    } catch (error) {
      // the round is already over for the player; keep going without the ledger entry
      // eslint-disable-next-line no-console
      console.error('[ledger] failed to record score', { ownerId, score }, error);
    }
  }
}
