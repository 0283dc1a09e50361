import type { MoveDir } from '../../../shared/src/protocol';
import type { GameService } from '../services/gameService';
import {
  isMessageNotModifiedError,
  type InlineKeyboardMarkup,
  type TelegramCallbackQuery,
  type TelegramClient,
  type TelegramMessage,
  type TelegramUpdate,
  type TelegramUser,
} from './botApi';

const MOVE_BUTTON_ROWS: ReadonlyArray<ReadonlyArray<{ text: string; dir: MoveDir }>> = [
  [{ text: 'Up', dir: 'up' }],
  [
    { text: 'Left', dir: 'left' },
    { text: 'Right', dir: 'right' },
  ],
  [{ text: 'Down', dir: 'down' }],
];

export function buildMoveKeyboard(): InlineKeyboardMarkup {
  return {
    inline_keyboard: MOVE_BUTTON_ROWS.map((row) => row.map(({ text, dir }) => ({ text, callback_data: dir }))),
  };
}

export function describePlayer(user: TelegramUser): string {
  const fullName = `${user.first_name ?? ''}${user.last_name ? ` ${user.last_name}` : ''}`.trim();
  if (fullName) return fullName;
  if (user.username) return `@${user.username}`;
  return `Player ${user.id}`;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : null;
}

function parseUser(raw: unknown): TelegramUser | null {
  const payload = asRecord(raw);
  if (!payload || typeof payload.id !== 'number') return null;
  return {
    id: payload.id,
    first_name: typeof payload.first_name === 'string' ? payload.first_name : undefined,
    last_name: typeof payload.last_name === 'string' ? payload.last_name : undefined,
    username: typeof payload.username === 'string' ? payload.username : undefined,
  };
}

function parseMessage(raw: unknown): TelegramMessage | null {
  const payload = asRecord(raw);
  const chat = asRecord(payload?.chat);
  if (!payload || !chat || typeof payload.message_id !== 'number' || typeof chat.id !== 'number') return null;
  return {
    message_id: payload.message_id,
    chat: { id: chat.id },
    from: parseUser(payload.from) ?? undefined,
    text: typeof payload.text === 'string' ? payload.text : undefined,
  };
}

function parseCallbackQuery(raw: unknown): TelegramCallbackQuery | null {
  const payload = asRecord(raw);
  if (!payload || typeof payload.id !== 'string') return null;
  const from = parseUser(payload.from);
  if (!from) return null;
  return {
    id: payload.id,
    from,
    message: parseMessage(payload.message) ?? undefined,
    data: typeof payload.data === 'string' ? payload.data : undefined,
  };
}

/**
 * Narrows an untrusted Update body to the fields the game reads.
 */
export function parseTelegramUpdate(raw: unknown): TelegramUpdate | null {
  const payload = asRecord(raw);
  if (!payload || typeof payload.update_id !== 'number') return null;
  return {
    update_id: payload.update_id,
    message: parseMessage(payload.message) ?? undefined,
    callback_query: parseCallbackQuery(payload.callback_query) ?? undefined,
  };
}

// "/start", "/start@SomeBot", "/start payload"
function parseCommand(text: string): string | null {
  const match = text.trim().match(/^\/([a-z_]+)(?:@\w+)?(?:\s|$)/i);
  return match?.[1]?.toLowerCase() ?? null;
}

export class TelegramUpdateHandler {
  constructor(
    private readonly client: TelegramClient,
    private readonly game: GameService,
  ) {}

  async handle(update: TelegramUpdate): Promise<void> {
    if (update.callback_query) {
      await this.handleCallback(update.callback_query);
      return;
    }
    if (update.message) {
      await this.handleMessage(update.message);
    }
  }

  private async handleMessage(message: TelegramMessage): Promise<void> {
    const command = message.text ? parseCommand(message.text) : null;
    const chatId = message.chat.id;

    if (command === 'start') {
      const from = message.from ?? { id: chatId };
      const text = await this.game.startRound(String(chatId), String(from.id), describePlayer(from));
      await this.client.sendMessage(chatId, text, buildMoveKeyboard());
      return;
    }

    if (command === 'leaderboard') {
      await this.client.sendMessage(chatId, await this.game.getLeaderboardText());
    }
  }

  private async handleCallback(query: TelegramCallbackQuery): Promise<void> {
    const message = query.message;
    if (!message) {
      await this.client.answerCallbackQuery(query.id);
      return;
    }

    const chatId = message.chat.id;
    let failure: { error: unknown } | null = null;

    try {
      const text = await this.game.processMove(String(chatId), query.data ?? '');
      await this.client.editMessageText(chatId, message.message_id, text, buildMoveKeyboard());
    } catch (error) {
      if (!isMessageNotModifiedError(error)) failure = { error };
    }

    try {
      await this.client.answerCallbackQuery(query.id);
    } catch (answerError) {
      if (!failure) throw answerError;
      // eslint-disable-next-line no-console
      console.warn('[telegram] answerCallbackQuery failed', { callbackQueryId: query.id }, answerError);
    }

    if (failure) throw failure.error;
  }
}
