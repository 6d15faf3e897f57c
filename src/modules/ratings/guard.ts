/**
 * Self-Action Guard.
 *
 * Propósito: recordar, durante una ventana corta, las reacciones que el propio bot
 * quitó (voto inválido o reemplazado). Discord reporta esa remoción como un
 * `messageReactionRemove` normal; sin esta marca el router borraría el rating
 * vigente del usuario o entraría en un loop.
 *
 * Invariantes:
 * - Una marca registrada en T se considera ausente para cualquier consulta en
 *   T + cooldown o después.
 * - La primera consulta que coincide consume la marca, así una acción legítima
 *   repetida dentro de la ventana no queda suprimida dos veces.
 * - Es un cache con expiración, no una fuente de verdad: perder una marca solo
 *   provoca un ciclo de procesamiento redundante.
 */
import type { EmojiSymbol, MessageId, UserId } from "@/db/types";

export const DEFAULT_GUARD_COOLDOWN_MS = 5_000;

export interface SelfActionGuardOptions {
  cooldownMs?: number;
  now?: () => number;
}

type GuardEntry = {
  expiresAt: number;
  timer: NodeJS.Timeout;
};

export class SelfActionGuard {
  private readonly entries = new Map<string, GuardEntry>();
  private readonly cooldownMs: number;
  private readonly now: () => number;

  constructor(options: SelfActionGuardOptions = {}) {
    this.cooldownMs = Math.max(0, options.cooldownMs ?? DEFAULT_GUARD_COOLDOWN_MS);
    this.now = options.now ?? Date.now;
  }

  private key(userId: UserId, messageId: MessageId, symbol: EmojiSymbol): string {
    return `${userId}:${messageId}:${symbol}`;
  }

  private drop(key: string): void {
    const entry = this.entries.get(key);
    if (!entry) return;
    clearTimeout(entry.timer);
    this.entries.delete(key);
  }

  /**
   * Registra que el bot está por quitar `symbol` de `userId` en `messageId`.
   * Debe llamarse ANTES de pedir la remoción al gateway.
   */
  mark(userId: UserId, messageId: MessageId, symbol: EmojiSymbol): void {
    const key = this.key(userId, messageId, symbol);
    this.drop(key);

    const timer = setTimeout(() => {
      this.entries.delete(key);
    }, this.cooldownMs);
    timer.unref?.();

    this.entries.set(key, { expiresAt: this.now() + this.cooldownMs, timer });
  }

  isSelfInitiated(userId: UserId, messageId: MessageId, symbol: EmojiSymbol): boolean {
    const key = this.key(userId, messageId, symbol);
    const entry = this.entries.get(key);
    if (!entry) return false;

    // Consumida (o vencida) en ambos casos.
    this.drop(key);
    return this.now() < entry.expiresAt;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    for (const entry of this.entries.values()) {
      clearTimeout(entry.timer);
    }
    this.entries.clear();
  }
}
