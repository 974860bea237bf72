import { MessageSchema, type Message, type MessageKind } from '../types.js';
import type { Roster } from '../roster.js';
import type { Transport } from './transport.js';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';

export type DeliveryFailureReason = 'unreachable' | 'timeout' | 'malformed';

export interface DeliveryFailure {
  recipient: string;
  reason: DeliveryFailureReason;
  detail: string;
}

export type SendResult = { ok: true; response: Message } | { ok: false; failure: DeliveryFailure };

/** A response together with the identity it was requested from. */
export interface Reply {
  from: string;
  message: Message;
}

export interface MessengerConfig {
  sender: string;
  sendTimeoutMs: number;
}

class SendTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`);
    this.name = 'SendTimeoutError';
  }
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;
  let t: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      t = setTimeout(() => reject(new SendTimeoutError(timeoutMs)), timeoutMs);
    }),
  ]).finally(() => {
    if (t) clearTimeout(t);
  });
}

/**
 * One request, one reply. Every failure mode comes back as a `DeliveryFailure`;
 * nothing a single recipient does can reject these promises.
 */
export class Messenger {
  readonly sender: string;
  private readonly transport: Transport;
  private readonly sendTimeoutMs: number;

  constructor(transport: Transport, cfg: MessengerConfig) {
    this.transport = transport;
    this.sender = cfg.sender;
    this.sendTimeoutMs = cfg.sendTimeoutMs;
  }

  /** Build a request from this messenger's identity. */
  message(kind: MessageKind, content: string): Message {
    return Object.freeze({ kind, source: this.sender, content });
  }

  async send(request: Message, recipient: string): Promise<SendResult> {
    let raw: unknown;
    try {
      raw = await withTimeout(this.transport.send(request, recipient, this.sender), this.sendTimeoutMs);
    } catch (error) {
      const reason: DeliveryFailureReason = error instanceof SendTimeoutError ? 'timeout' : 'unreachable';
      return this.fail(request, { recipient, reason, detail: errorMessage(error) });
    }

    const parsed = MessageSchema.safeParse(raw);
    if (!parsed.success) {
      return this.fail(request, {
        recipient,
        reason: 'malformed',
        detail: parsed.error.issues.map(i => i.message).join('; '),
      });
    }
    return { ok: true, response: Object.freeze(parsed.data) };
  }

  /**
   * Send `request` to every alive participant holding `role` ('*' for everyone).
   *
   * Recipients are fixed when the call starts. Sends run concurrently; replies come back in
   * seat order and failed recipients are left out.
   */
  async fanout<R extends string>(request: Message, roster: Roster<R>, role: R | '*'): Promise<Reply[]> {
    const recipients = roster.aliveOfRole(role).map(p => p.identity);
    return this.fanoutTo(request, recipients);
  }

  async fanoutTo(request: Message, recipients: readonly string[]): Promise<Reply[]> {
    const results = await Promise.all(recipients.map(r => this.send(request, r)));
    const replies: Reply[] = [];
    results.forEach((result, i) => {
      const from = recipients[i];
      if (result.ok && from !== undefined) replies.push({ from, message: result.response });
    });
    return replies;
  }

  /** Notify every alive participant; replies are discarded. */
  async broadcast<R extends string>(request: Message, roster: Roster<R>): Promise<void> {
    await this.fanout(request, roster, '*');
  }

  private fail(request: Message, failure: DeliveryFailure): SendResult {
    logger.log({
      type: 'DELIVERY',
      player: failure.recipient,
      content: `${request.kind} delivery failed (${failure.reason}): ${failure.detail}`,
      metadata: { visibility: 'private', reason: failure.reason, kind: request.kind },
    });
    return { ok: false, failure };
  }
}
