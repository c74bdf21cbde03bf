
import Redis from "ioredis";
import { v4 as uuid } from "uuid";
import { SessionNotFoundError } from "./errors";
import { newInterviewState } from "./interview";
import type { SessionData } from "../types/session";
import { logError, logInfo, logWarn } from "../utils/logger";

/**
 * Per-session state, passed explicitly to every handler.
 * A session lives from create() until delete() (or its TTL, for Redis).
 */
export interface SessionStore {
  create(): Promise<SessionData>;
  /** Throws SessionNotFoundError for unknown ids */
  get(id: string): Promise<SessionData>;
  save(session: SessionData): Promise<void>;
  delete(id: string): Promise<void>;
}

export function newSession(): SessionData {
  return {
    id: uuid(),
    createdAt: new Date().toISOString(),
    student: [],
    interview: newInterviewState(),
  };
}

function clone(s: SessionData): SessionData {
  return structuredClone(s);
}

export interface MemorySessionStoreOptions {
  /** Sliding lifetime, refreshed on save. Unset means sessions live until deleted. */
  ttlSeconds?: number;
  now?: () => number;
}

interface MemoryEntry {
  session: SessionData;
  expiresAt: number;
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, MemoryEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: MemorySessionStoreOptions = {}) {
    this.ttlMs = opts.ttlSeconds === undefined ? Infinity : opts.ttlSeconds * 1000;
    this.now = opts.now ?? Date.now;
  }

  async create(): Promise<SessionData> {
    this.sweep();
    const s = newSession();
    this.put(s);
    return s;
  }

  async get(id: string): Promise<SessionData> {
    return clone(this.live(id).session);
  }

  async save(session: SessionData): Promise<void> {
    this.live(session.id);
    this.put(session);
  }

  async delete(id: string): Promise<void> {
    this.sessions.delete(id);
  }

  /** Live sessions */
  get size(): number {
    this.sweep();
    return this.sessions.size;
  }

  private put(session: SessionData) {
    this.sessions.set(session.id, { session: clone(session), expiresAt: this.now() + this.ttlMs });
  }

  private live(id: string): MemoryEntry {
    const entry = this.sessions.get(id);
    if (!entry) throw new SessionNotFoundError(id);
    if (entry.expiresAt <= this.now()) {
      this.sessions.delete(id);
      throw new SessionNotFoundError(id);
    }
    return entry;
  }

  private sweep() {
    const now = this.now();
    for (const [id, entry] of this.sessions) {
      if (entry.expiresAt <= now) this.sessions.delete(id);
    }
  }
}

/** The ioredis commands the Redis store needs. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>;
  expire(key: string, seconds: number): Promise<number>;
  del(key: string): Promise<number>;
}

function key(id: string) { return `session:${id}`; }

export class RedisSessionStore implements SessionStore {
  constructor(private readonly redis: RedisLike, private readonly ttlSeconds: number) {}

  async create(): Promise<SessionData> {
    const s = newSession();
    await this.redis.set(key(s.id), JSON.stringify(s), "EX", this.ttlSeconds);
    return s;
  }

  async get(id: string): Promise<SessionData> {
    const raw = await this.redis.get(key(id));
    if (!raw) throw new SessionNotFoundError(id);
    return JSON.parse(raw) as SessionData;
  }

  async save(session: SessionData): Promise<void> {
    // refresh the TTL only for sessions that still exist
    const touched = await this.redis.expire(key(session.id), this.ttlSeconds);
    if (touched === 0) throw new SessionNotFoundError(session.id);
    await this.redis.set(key(session.id), JSON.stringify(session), "EX", this.ttlSeconds);
  }

  async delete(id: string): Promise<void> {
    await this.redis.del(key(id));
  }
}

export function createSessionStore(redisUrl: string | undefined, ttlSeconds: number): SessionStore {
  if (!redisUrl) {
    logWarn("redis", "REDIS_URL not provided. Using in-memory fallback (dev only).");
    return new MemorySessionStore({ ttlSeconds });
  }
  const redis = new Redis(redisUrl);
  redis.on("error", (e) => logError("redis", e));
  logInfo("redis", "connected");
  return new RedisSessionStore(redis, ttlSeconds);
}
