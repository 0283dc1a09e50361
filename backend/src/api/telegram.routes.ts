import { Router } from 'express';
import { parseTelegramUpdate, type TelegramUpdateHandler } from '../telegram/updateHandler';

const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

export function createTelegramRouter(handler: TelegramUpdateHandler, webhookSecret?: string): Router {
  const telegramRouter = Router();

  telegramRouter.post('/webhook', async (req, res) => {
    if (webhookSecret && req.get(SECRET_HEADER) !== webhookSecret) {
      return res.status(401).json({ ok: false, error: 'unauthorized' });
    }

    const update = parseTelegramUpdate(req.body);
    if (!update) {
      return res.status(400).json({ ok: false, error: 'invalid_update' });
    }

    try {
      await handler.handle(update);
    } catch (error) {
      // Telegram retries non-2xx answers; a failed update is logged and dropped instead
      // eslint-disable-next-line no-console
      console.error('[telegram] webhook update failed', { updateId: update.update_id }, error);
    }

    return res.status(200).json({ ok: true });
  });

  return telegramRouter;
}
