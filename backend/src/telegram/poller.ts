import type { TelegramClient } from './botApi';
import { parseTelegramUpdate, type TelegramUpdateHandler } from './updateHandler';

const LONG_POLL_TIMEOUT_SEC = 25;
const ERROR_BACKOFF_MS = 1000;

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class TelegramPoller {
  private offset = 0;
  private readonly abort = new AbortController();
  private running: Promise<void> | null = null;

  constructor(
    private readonly client: TelegramClient,
    private readonly handler: TelegramUpdateHandler,
    private readonly backoffMs = ERROR_BACKOFF_MS,
  ) {}

  get nextOffset(): number {
    return this.offset;
  }

  start(): Promise<void> {
    if (!this.running) {
      this.running = this.loop();
    }
    return this.running;
  }

  async stop(): Promise<void> {
    this.abort.abort();
    await this.running;
  }

  /** One getUpdates round trip; returns how many updates were handled. */
  async pollOnce(): Promise<number> {
    const rawUpdates = await this.client.getUpdates(this.offset, LONG_POLL_TIMEOUT_SEC, this.abort.signal);
    let handled = 0;

    for (const raw of rawUpdates) {
      const update = parseTelegramUpdate(raw);
      if (!update) {
        // eslint-disable-next-line no-console
        console.warn('[telegram] skipping malformed update', raw);
        continue;
      }

      // advance first so a failing update is not redelivered forever
      this.offset = Math.max(this.offset, update.update_id + 1);

      try {
        await this.handler.handle(update);
        handled += 1;
      } catch (error) {
        // eslint-disable-next-line no-console
        console.error('[telegram] update handler failed', { updateId: update.update_id }, error);
      }
    }

    return handled;
  }

  private async loop(): Promise<void> {
    while (!this.abort.signal.aborted) {
      try {
        await this.pollOnce();
      } catch (error) {
        if (this.abort.signal.aborted) break;
        // eslint-disable-next-line no-console
        console.error('[telegram] getUpdates failed', error);
        await sleep(this.backoffMs, this.abort.signal);
      }
    }
  }
}
