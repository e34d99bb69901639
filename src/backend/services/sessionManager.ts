/**
 * Session Manager Service
 *
 * Keeps per-session conversation history for follow-up questions.
 *
 * - History is a ring buffer of completed turns (maxTurns, oldest evicted)
 * - Sessions expire ttlMs after their last activity
 * - Appends to one session are serialized; different sessions never wait
 *   on each other
 * - Optional JSON persistence, one file per session, written atomically
 *
 * A turn is only appended once it has completed, so a failed or cancelled
 * request leaves the session untouched.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
    isLanguageCode,
    QuerySession,
    SessionTurn,
    StoredSession,
    StoredTurn,
} from '../../shared/types';
import { PipelineError } from '../errors';
import { describeError, Logger, NullLogger } from '../utils/logger';
import { RingBuffer } from '../utils/ringBuffer';

/**
 * Configuration options for the SessionManager.
 */
export interface SessionManagerConfig {
    /** Turns kept per session */
    maxTurns: number;
    /** Idle time after which a session is destroyed */
    ttlMs: number;
    /** Directory for session files; memory only when unset */
    storagePath?: string;
    /** Clock, replaceable in tests */
    now: () => Date;
}

export const DEFAULT_SESSION_CONFIG: SessionManagerConfig = {
    maxTurns: 20,
    ttlMs: 30 * 60 * 1000,
    now: () => new Date(),
};

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function isValidSessionId(id: string): boolean {
    return SESSION_ID_PATTERN.test(id);
}

interface SessionState {
    id: string;
    createdAt: Date;
    lastActiveAt: Date;
    turns: RingBuffer<SessionTurn>;
}

/**
 * SessionManager
 *
 * Repository for conversation sessions. Callers get snapshots
 * (QuerySession); the ring buffers stay private.
 */
export class SessionManager {
    private readonly config: SessionManagerConfig;
    private readonly sessions = new Map<string, SessionState>();
    private readonly appendQueues = new Map<string, Promise<unknown>>();

    constructor(config: Partial<SessionManagerConfig> = {}, private readonly logger: Logger = new NullLogger()) {
        this.config = { ...DEFAULT_SESSION_CONFIG, ...config };
        if (!Number.isInteger(this.config.maxTurns) || this.config.maxTurns < 1) {
            throw new RangeError(`maxTurns must be a positive integer, got ${this.config.maxTurns}`);
        }
        if (this.config.storagePath) {
            fs.mkdirSync(this.config.storagePath, { recursive: true });
        }
    }

    /**
     * Returns the live session with this id, or starts a new one.
     * Without an id, or when the id has expired, a fresh session is created
     * (keeping the caller's id).
     */
    async getOrCreate(id?: string): Promise<QuerySession> {
        return this.snapshot(this.resolve(id ?? uuidv4()));
    }

    /**
     * @returns the session, or null if it does not exist or has expired
     */
    async get(id: string): Promise<QuerySession | null> {
        const state = this.lookup(id);
        return state ? this.snapshot(state) : null;
    }

    /**
     * Appends a completed turn. Appends to the same session run one at a
     * time in call order.
     */
    appendTurn(id: string, turn: SessionTurn): Promise<QuerySession> {
        const previous = this.appendQueues.get(id) ?? Promise.resolve();
        const next = previous
            .catch(() => undefined)
            .then(() => {
                const state = this.resolve(id);
                state.turns.push(turn);
                state.lastActiveAt = this.config.now();
                this.save(state);
                return this.snapshot(state);
            });

        this.appendQueues.set(id, next);
        const cleanup = (): void => {
            if (this.appendQueues.get(id) === next) {
                this.appendQueues.delete(id);
            }
        };
        void next.then(cleanup, cleanup);
        return next;
    }

    /**
     * Destroys a session.
     *
     * @returns true if the session existed
     */
    async reset(id: string): Promise<boolean> {
        const existed = this.lookup(id) !== undefined;
        this.destroy(id);
        return existed;
    }

    /**
     * Destroys every session idle for longer than ttlMs.
     *
     * @returns number of sessions removed
     */
    async purgeExpired(now: Date = this.config.now()): Promise<number> {
        let removed = 0;
        for (const state of [...this.sessions.values()]) {
            if (this.isExpired(state, now)) {
                this.destroy(state.id);
                removed++;
            }
        }
        if (removed > 0) {
            this.logger.debug('Purged expired sessions', { removed });
        }
        return removed;
    }

    /**
     * Live sessions, most recently active first.
     */
    async list(): Promise<QuerySession[]> {
        await this.purgeExpired();
        return [...this.sessions.values()]
            .sort((a, b) => b.lastActiveAt.getTime() - a.lastActiveAt.getTime())
            .map((state) => this.snapshot(state));
    }

    private resolve(id: string): SessionState {
        const existing = this.lookup(id);
        if (existing) {
            return existing;
        }

        const now = this.config.now();
        const state: SessionState = {
            id,
            createdAt: now,
            lastActiveAt: now,
            turns: new RingBuffer(this.config.maxTurns),
        };
        this.sessions.set(id, state);
        return state;
    }

    /**
     * Memory first, then disk. Expired sessions are destroyed on sight.
     */
    private lookup(id: string): SessionState | undefined {
        if (!isValidSessionId(id)) {
            throw new PipelineError(`Invalid session id: ${id}`, 'session');
        }

        const state = this.sessions.get(id) ?? this.load(id);
        if (!state) {
            return undefined;
        }
        if (this.isExpired(state, this.config.now())) {
            this.destroy(id);
            return undefined;
        }
        this.sessions.set(id, state);
        return state;
    }

    private isExpired(state: SessionState, now: Date): boolean {
        return now.getTime() - state.lastActiveAt.getTime() > this.config.ttlMs;
    }

    private destroy(id: string): void {
        this.sessions.delete(id);
        const filePath = this.getSessionFilePath(id);
        if (filePath && fs.existsSync(filePath)) {
            fs.unlinkSync(filePath);
        }
    }

    private snapshot(state: SessionState): QuerySession {
        return {
            id: state.id,
            createdAt: state.createdAt,
            lastActiveAt: state.lastActiveAt,
            turns: state.turns.toArray(),
        };
    }

    private getSessionFilePath(id: string): string | undefined {
        return this.config.storagePath ? path.join(this.config.storagePath, `${id}.json`) : undefined;
    }

    /**
     * Write to a temp file first, then rename, so a crash mid-write never
     * leaves a truncated session file.
     */
    private save(state: SessionState): void {
        const filePath = this.getSessionFilePath(state.id);
        if (!filePath) {
            return;
        }

        const tempPath = `${filePath}.tmp`;
        fs.writeFileSync(tempPath, JSON.stringify(serializeSession(state), null, 2));
        fs.renameSync(tempPath, filePath);
    }

    private load(id: string): SessionState | undefined {
        const filePath = this.getSessionFilePath(id);
        if (!filePath || !fs.existsSync(filePath)) {
            return undefined;
        }

        try {
            const stored = parseStoredSession(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
            if (!stored) {
                this.logger.warn('Ignoring malformed session file', { sessionId: id });
                return undefined;
            }
            const turns = new RingBuffer<SessionTurn>(this.config.maxTurns);
            for (const turn of stored.turns) {
                turns.push(deserializeTurn(turn));
            }
            return {
                id: stored.id,
                createdAt: new Date(stored.createdAt),
                lastActiveAt: new Date(stored.lastActiveAt),
                turns,
            };
        } catch (error) {
            // A corrupted file should not take the session endpoint down.
            this.logger.error('Error reading session file', { sessionId: id, error: describeError(error) });
            return undefined;
        }
    }
}

function serializeSession(state: SessionState): StoredSession {
    return {
        id: state.id,
        createdAt: state.createdAt.toISOString(),
        lastActiveAt: state.lastActiveAt.toISOString(),
        turns: state.turns.toArray().map(serializeTurn),
    };
}

function serializeTurn(turn: SessionTurn): StoredTurn {
    return { ...turn, timestamp: turn.timestamp.toISOString() };
}

function deserializeTurn(stored: StoredTurn): SessionTurn {
    return { ...stored, timestamp: new Date(stored.timestamp) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function parseStoredTurn(value: unknown): StoredTurn | undefined {
    if (!isRecord(value)) {
        return undefined;
    }
    const { question, answer, searchQuery, routedQuery, detectedLanguage, retrievedChunkIds, timestamp } = value;
    if (
        typeof question !== 'string' ||
        typeof answer !== 'string' ||
        typeof searchQuery !== 'string' ||
        typeof detectedLanguage !== 'string' ||
        !isLanguageCode(detectedLanguage) ||
        !isStringArray(retrievedChunkIds) ||
        typeof timestamp !== 'string'
    ) {
        return undefined;
    }
    return {
        question,
        answer,
        searchQuery,
        // Files written before routedQuery existed only have the search text.
        routedQuery: typeof routedQuery === 'string' ? routedQuery : searchQuery,
        detectedLanguage,
        retrievedChunkIds,
        timestamp,
    };
}

export function parseStoredSession(value: unknown): StoredSession | undefined {
    if (!isRecord(value)) {
        return undefined;
    }
    const { id, createdAt, lastActiveAt, turns } = value;
    if (
        typeof id !== 'string' ||
        typeof createdAt !== 'string' ||
        typeof lastActiveAt !== 'string' ||
        !Array.isArray(turns)
    ) {
        return undefined;
    }

    const parsedTurns: StoredTurn[] = [];
    for (const turn of turns) {
        const parsed = parseStoredTurn(turn);
        if (!parsed) {
            return undefined;
        }
        parsedTurns.push(parsed);
    }
    return { id, createdAt, lastActiveAt, turns: parsedTurns };
}

/**
 * Factory function to create a SessionManager instance.
 */
export function createSessionManager(
    config?: Partial<SessionManagerConfig>,
    logger?: Logger
): SessionManager {
    return new SessionManager(config, logger);
}
