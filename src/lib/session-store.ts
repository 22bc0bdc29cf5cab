import { v4 as uuidv4 } from "uuid";
import { ValidationError } from "./errors";
import type { RatedRecipe, RatingStats, Recipe } from "./types";

export const MAX_STARS = 5;

export class SessionNotFoundError extends Error {
  constructor(sessionId: string) {
    super(`Session ${sessionId} not found or expired`);
    this.name = "SessionNotFoundError";
  }
}

interface SessionState {
  recipes: RatedRecipe[];
  lastSeenAt: number;
}

export interface SessionStoreOptions {
  ttlMs: number;
  now?: () => number;
}

/**
 * In-memory recipes and ratings, one entry per browser session.
 * Nothing survives the session: `end`, expiry, or a process restart drops it.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  create(): string {
    const id = uuidv4();
    this.sessions.set(id, { recipes: [], lastSeenAt: this.now() });
    return id;
  }

  /** Marks the session as active. False when it never existed or has expired. */
  touch(sessionId: string): boolean {
    const state = this.live(sessionId);
    if (!state) return false;
    state.lastSeenAt = this.now();
    return true;
  }

  end(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /** Replaces the session's recipe set; every recipe starts unrated. */
  record(sessionId: string, recipes: Recipe[]): RatedRecipe[] {
    const state = this.require(sessionId);
    state.recipes = recipes.map((recipe) => ({
      id: uuidv4(),
      recipe,
      rating: 0,
      ratedAt: null,
    }));
    return state.recipes;
  }

  rate(sessionId: string, recipeId: string, stars: number): RatedRecipe {
    if (!Number.isInteger(stars) || stars < 0 || stars > MAX_STARS) {
      throw new ValidationError("OUT_OF_RANGE", `Rating must be a whole number from 0 to ${MAX_STARS}`);
    }
    const state = this.require(sessionId);
    const entry = state.recipes.find((r) => r.id === recipeId);
    if (!entry) {
      throw new ValidationError("UNKNOWN_RECIPE", `No recipe ${recipeId} in this session`);
    }
    entry.rating = stars;
    entry.ratedAt = stars > 0 ? new Date(this.now()).toISOString() : null;
    return entry;
  }

  get(sessionId: string): RatedRecipe[] {
    return this.live(sessionId)?.recipes ?? [];
  }

  clearRatings(sessionId: string): void {
    for (const entry of this.require(sessionId).recipes) {
      entry.rating = 0;
      entry.ratedAt = null;
    }
  }

  stats(sessionId: string): RatingStats {
    const distribution: RatingStats["distribution"] = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
    let total = 0;
    let ratedCount = 0;

    for (const { rating } of this.get(sessionId)) {
      if (rating === 1 || rating === 2 || rating === 3 || rating === 4 || rating === 5) {
        distribution[rating]++;
        total += rating;
        ratedCount++;
      }
    }

    return {
      average: ratedCount > 0 ? Math.round((total / ratedCount) * 10) / 10 : 0,
      ratedCount,
      distribution,
    };
  }

  /** Drops sessions idle for longer than the TTL. Returns how many were removed. */
  sweepExpired(): number {
    let removed = 0;
    for (const [id, state] of this.sessions) {
      if (this.isExpired(state)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(state: SessionState): boolean {
    return this.now() - state.lastSeenAt > this.ttlMs;
  }

  private live(sessionId: string): SessionState | undefined {
    const state = this.sessions.get(sessionId);
    if (!state) return undefined;
    if (this.isExpired(state)) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return state;
  }

  private require(sessionId: string): SessionState {
    const state = this.live(sessionId);
    if (!state) {
      throw new SessionNotFoundError(sessionId);
    }
    return state;
  }
}
