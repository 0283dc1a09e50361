export type InlineKeyboardButton = {
  text: string;
  callback_data: string;
};

export type InlineKeyboardMarkup = {
  inline_keyboard: InlineKeyboardButton[][];
};

export type TelegramUser = {
  id: number;
  first_name?: string;
  last_name?: string;
  username?: string;
};

export type TelegramChat = {
  id: number;
};

export type TelegramMessage = {
  message_id: number;
  chat: TelegramChat;
  from?: TelegramUser;
  text?: string;
};

export type TelegramCallbackQuery = {
  id: string;
  from: TelegramUser;
  message?: TelegramMessage;
  data?: string;
};

export type TelegramUpdate = {
  update_id: number;
  message?: TelegramMessage;
  callback_query?: TelegramCallbackQuery;
};

/**
 * The Bot API calls the game glue uses. Tests implement this with a recorder.
 */
export interface TelegramClient {
  sendMessage(chatId: number, text: string, replyMarkup?: InlineKeyboardMarkup): Promise<void>;
  editMessageText(chatId: number, messageId: number, text: string, replyMarkup?: InlineKeyboardMarkup): Promise<void>;
  answerCallbackQuery(callbackQueryId: string): Promise<void>;
  getUpdates(offset: number, timeoutSec: number, signal?: AbortSignal): Promise<unknown[]>;
}

export class TelegramApiError extends Error {
  readonly code = 'TELEGRAM_API_ERROR';

  constructor(
    readonly method: string,
    readonly status: number,
    readonly description: string,
  ) {
    super(`Telegram ${method} failed (${status}): ${description}`);
    this.name = 'TelegramApiError';
  }
}

export function isMessageNotModifiedError(error: unknown): boolean {
  return error instanceof TelegramApiError && error.description.includes('message is not modified');
}

type FetchFn = typeof fetch;

export class TelegramBotApi implements TelegramClient {
  private readonly baseUrl: string;

  constructor(
    botToken: string,
    private readonly fetchImpl: FetchFn = fetch,
    apiRoot = 'https://api.telegram.org',
  ) {
    this.baseUrl = `${apiRoot}/bot${botToken}`;
  }

  private async call(method: string, payload: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const res = await this.fetchImpl(`${this.baseUrl}/${method}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
      signal,
    });

    let body: unknown = null;
    try {
      body = await res.json();
    } catch {
      throw new TelegramApiError(method, res.status, 'non-JSON response');
    }

    const envelope = typeof body === 'object' && body !== null ? (body as Record<string, unknown>) : {};
    if (!res.ok || envelope.ok !== true) {
      throw new TelegramApiError(method, res.status, String(envelope.description ?? 'unknown error'));
    }
    return envelope.result;
  }

  async sendMessage(chatId: number, text: string, replyMarkup?: InlineKeyboardMarkup): Promise<void> {
    await this.call('sendMessage', { chat_id: chatId, text, reply_markup: replyMarkup });
  }

  async editMessageText(
    chatId: number,
    messageId: number,
    text: string,
    replyMarkup?: InlineKeyboardMarkup,
  ): Promise<void> {
    await this.call('editMessageText', { chat_id: chatId, message_id: messageId, text, reply_markup: replyMarkup });
  }

  async answerCallbackQuery(callbackQueryId: string): Promise<void> {
    await this.call('answerCallbackQuery', { callback_query_id: callbackQueryId });
  }

  async getUpdates(offset: number, timeoutSec: number, signal?: AbortSignal): Promise<unknown[]> {
    const result = await this.call(
      'getUpdates',
      { offset, timeout: timeoutSec, allowed_updates: ['message', 'callback_query'] },
      signal,
    );
    return Array.isArray(result) ? result : [];
  }
}
