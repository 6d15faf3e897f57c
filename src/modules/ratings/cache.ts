/**
 * Aggregation Cache.
 *
 * Propósito: evitar recalcular promedio/conteo en cada lectura del resumen.
 * Encaje: `RatingService` lee aquí primero y cae a `RatingStore.statsFor` en un miss.
 *
 * Invariantes:
 * - Una entrada nunca se sirve con edad >= TTL.
 * - Toda mutación de ratings llama `invalidate` antes de confirmar al caller.
 * - Cada `invalidate` incrementa la generación de la key. Un `put` que trae una
 *   generación anterior a la actual se rechaza: así un lector que leyó la DB antes
 *   de la mutación no puede repoblar el cache con datos viejos.
 *
 * Gotchas:
 * - `sweepExpired` purga las generaciones de keys sin entrada viva, pero nunca las
 *   reinicia en 0: una key purgada arranca desde `prunedFloor`, el máximo purgado
 *   hasta el momento. Así la generación de cada key sólo crece y un lector lento
 *   con una generación vieja sigue siendo rechazado.
 */
import type { ItemId } from "@/db/types";
import { itemKey } from "./context";
import type { RatingContext, RatingStats } from "./types";

export const DEFAULT_CACHE_TTL_MS = 300_000;
export const DEFAULT_CACHE_SWEEP_MS = 60_000;

/** Contract the service depends on; lets a shared backend replace the in-process map. */
export interface AggregateCache {
  get(itemId: ItemId, context: RatingContext): RatingStats | null;
  put(
    itemId: ItemId,
    context: RatingContext,
    stats: RatingStats,
    generation?: number,
  ): boolean;
  invalidate(itemId: ItemId, context: RatingContext): void;
  generation(itemId: ItemId, context: RatingContext): number;
  sweepExpired(): number;
}

export interface AggregationCacheOptions {
  ttlMs?: number;
  sweepIntervalMs?: number;
  now?: () => number;
}

type CacheEntry = {
  stats: RatingStats;
  storedAt: number;
  generation: number;
};

const cloneStats = (stats: RatingStats): RatingStats => ({
  average: stats.average,
  count: stats.count,
  ratingValues: [...stats.ratingValues],
});

export class AggregationCache implements AggregateCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly generations = new Map<string, number>();
  private prunedFloor = 0;
  private readonly ttlMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: AggregationCacheOptions = {}) {
    this.ttlMs = Math.max(0, options.ttlMs ?? DEFAULT_CACHE_TTL_MS);
    this.sweepIntervalMs = Math.max(1, options.sweepIntervalMs ?? DEFAULT_CACHE_SWEEP_MS);
    this.now = options.now ?? Date.now;
  }

  private currentGeneration(key: string): number {
    return this.generations.get(key) ?? this.prunedFloor;
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.storedAt >= this.ttlMs;
  }

  get(itemId: ItemId, context: RatingContext): RatingStats | null {
    const key = itemKey(itemId, context);
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key);
      return null;
    }
    return cloneStats(entry.stats);
  }

  generation(itemId: ItemId, context: RatingContext): number {
    return this.currentGeneration(itemKey(itemId, context));
  }

  /**
   * Guarda stats para la key.
   *
   * @param generation Generación capturada por el lector antes de consultar la DB.
   * Si se omite se asume la actual (solo seguro cuando no hubo await en el medio).
   * @returns `false` si el snapshot quedó obsoleto y se descartó.
   */
  put(
    itemId: ItemId,
    context: RatingContext,
    stats: RatingStats,
    generation?: number,
  ): boolean {
    const key = itemKey(itemId, context);
    const current = this.currentGeneration(key);
    if (generation !== undefined && generation !== current) return false;

    this.entries.set(key, {
      stats: cloneStats(stats),
      storedAt: this.now(),
      generation: current,
    });
    return true;
  }

  invalidate(itemId: ItemId, context: RatingContext): void {
    const key = itemKey(itemId, context);
    this.entries.delete(key);
    this.generations.set(key, this.currentGeneration(key) + 1);
  }

  sweepExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    for (const [key, generation] of this.generations) {
      if (this.entries.has(key)) continue;
      this.prunedFloor = Math.max(this.prunedFloor, generation);
      this.generations.delete(key);
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Keys whose generation is tracked individually. */
  get generationCount(): number {
    return this.generations.size;
  }

  /** Arranca el barrido periódico. Idempotente. */
  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweepExpired();
    }, this.sweepIntervalMs);
    this.sweepTimer.unref?.();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.entries.clear();
  }
}
