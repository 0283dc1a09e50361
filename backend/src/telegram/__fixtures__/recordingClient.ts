import type { InlineKeyboardMarkup, TelegramClient } from '../botApi';

export type RecordedCall =
  | { method: 'sendMessage'; chatId: number; text: string; replyMarkup?: InlineKeyboardMarkup }
  | { method: 'editMessageText'; chatId: number; messageId: number; text: string; replyMarkup?: InlineKeyboardMarkup }
  | { method: 'answerCallbackQuery'; callbackQueryId: string };

/**
 * In-process Bot API stand-in: records outgoing calls, replays queued getUpdates batches.
 */
export class RecordingTelegramClient implements TelegramClient {
  readonly calls: RecordedCall[] = [];
  readonly updateBatches: unknown[][] = [];
  readonly offsets: number[] = [];
  editError: Error | null = null;

  async sendMessage(chatId: number, text: string, replyMarkup?: InlineKeyboardMarkup): Promise<void> {
    this.calls.push({ method: 'sendMessage', chatId, text, replyMarkup });
  }

  async editMessageText(
    chatId: number,
    messageId: number,
    text: string,
    replyMarkup?: InlineKeyboardMarkup,
  ): Promise<void> {
    if (this.editError) throw this.editError;
    this.calls.push({ method: 'editMessageText', chatId, messageId, text, replyMarkup });
  }

  async answerCallbackQuery(callbackQueryId: string): Promise<void> {
    this.calls.push({ method: 'answerCallbackQuery', callbackQueryId });
  }

  async getUpdates(offset: number, _timeoutSec?: number, _signal?: AbortSignal): Promise<unknown[]> {
    this.offsets.push(offset);
    return this.updateBatches.shift() ?? [];
  }
}
