import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { EnvironmentVariables } from '../../config/env.validation';
import { HarnessService, SamplingOptions } from '../harness/harness.service';
import { InvalidInputError } from '../harness/harness.errors';
import { ConversationTurn, PromptInput, PromptOptions } from '../harness/types';
import { ScenariosService } from '../scenarios/scenarios.service';

export interface HarnessSession {
    id: string;
    scenario: string | null;
    input: PromptInput;
    createdAt: Date;
    lastActiveAt: number;
}

export interface SessionTranscript {
    id: string;
    scenario: string | null;
    snippet: string;
    turns: ConversationTurn[];
    createdAt: Date;
}

export interface SessionReply {
    reply: string;
    completion: string;
    model: string;
    turnCount: number;
}

export interface CreateSessionInput extends PromptOptions {
    scenario?: string;
    snippet?: string;
}

/**
 * Process-local conversations. A session's turns are only ever appended, and a
 * user turn is recorded together with its reply once the backend has answered.
 * Sessions idle for longer than SESSION_IDLE_MINUTES are dropped, and past
 * SESSIONS_MAX the least recently used one is evicted.
 */
@Injectable()
export class SessionsService {
    private readonly logger = new Logger(SessionsService.name);
    private readonly sessions = new Map<string, HarnessSession>();
    private readonly pending = new Set<string>();
    private readonly maxSessions: number;
    private readonly idleMs: number;

    constructor(
        private readonly harnessService: HarnessService,
        private readonly scenariosService: ScenariosService,
        configService: ConfigService<EnvironmentVariables, true>,
    ) {
        this.maxSessions = configService.get('SESSIONS_MAX', { infer: true });
        this.idleMs = configService.get('SESSION_IDLE_MINUTES', { infer: true }) * 60_000;
    }

    /**
     * A scenario whose log ends on a user turn is answered here, so the first
     * message sent to the session never follows an unanswered question.
     */
    async create(body: CreateSessionInput, sampling: SamplingOptions = {}): Promise<SessionTranscript> {
        const options: PromptOptions = { delimiter: body.delimiter, instruction: body.instruction, labels: body.labels };
        let input: PromptInput;

        if (body.scenario) {
            const base = this.scenariosService.toPromptInput(body.scenario);
            input = {
                ...base,
                delimiter: options.delimiter ?? base.delimiter,
                instruction: options.instruction ?? base.instruction,
                labels: options.labels ?? base.labels,
            };
        } else if (body.snippet !== undefined) {
            input = { ...options, snippet: body.snippet, turns: [] };
        } else {
            throw new InvalidInputError('Provide either a scenario name or a knowledge snippet');
        }

        // Fails fast on an empty snippet or clashing labels.
        this.harnessService.assemble(input);

        if (input.turns.at(-1)?.speaker === 'user') {
            const result = await this.harnessService.complete(input, sampling);
            input.turns.push({ speaker: 'assistant', text: result.reply });
        }

        this.pruneIdle();
        this.evictOverflow();

        const now = Date.now();
        const session: HarnessSession = {
            id: uuidv4(),
            scenario: body.scenario ?? null,
            input,
            createdAt: new Date(now),
            lastActiveAt: now,
        };
        this.sessions.set(session.id, session);
        this.logger.log(`Session ${session.id} created${session.scenario ? ` from scenario ${session.scenario}` : ''}`);
        return this.transcript(session);
    }

    get(id: string): SessionTranscript {
        return this.transcript(this.find(id));
    }

    async send(id: string, text: string, sampling: SamplingOptions = {}): Promise<SessionReply> {
        const session = this.find(id);
        if (this.pending.has(id)) {
            throw new ConflictException(`Session ${id} is still waiting for a completion`);
        }

        const userTurn: ConversationTurn = { speaker: 'user', text };
        this.pending.add(id);
        try {
            const result = await this.harnessService.complete(
                { ...session.input, turns: [...session.input.turns, userTurn] },
                sampling,
            );
            session.input.turns.push(userTurn, { speaker: 'assistant', text: result.reply });
            session.lastActiveAt = Date.now();
            return {
                reply: result.reply,
                completion: result.completion,
                model: result.model,
                turnCount: session.input.turns.length,
            };
        } finally {
            this.pending.delete(id);
        }
    }

    remove(id: string): void {
        this.find(id);
        this.sessions.delete(id);
    }

    get size(): number {
        return this.sessions.size;
    }

    private find(id: string): HarnessSession {
        const session = this.sessions.get(id);
        if (!session || this.isIdle(session, Date.now())) {
            this.sessions.delete(id);
            throw new NotFoundException(`Session ${id} not found`);
        }
        // Map order doubles as recency order for eviction.
        session.lastActiveAt = Date.now();
        this.sessions.delete(id);
        this.sessions.set(id, session);
        return session;
    }

    private isIdle(session: HarnessSession, now: number): boolean {
        return !this.pending.has(session.id) && now - session.lastActiveAt > this.idleMs;
    }

    private pruneIdle(): void {
        const now = Date.now();
        for (const session of this.sessions.values()) {
            if (this.isIdle(session, now)) {
                this.sessions.delete(session.id);
                this.logger.debug(`Session ${session.id} expired`);
            }
        }
    }

    private evictOverflow(): void {
        for (const id of this.sessions.keys()) {
            if (this.sessions.size < this.maxSessions) {
                return;
            }
            if (!this.pending.has(id)) {
                this.sessions.delete(id);
                this.logger.log(`Session ${id} evicted (limit ${this.maxSessions})`);
            }
        }
    }

    private transcript(session: HarnessSession): SessionTranscript {
        return {
            id: session.id,
            scenario: session.scenario,
            snippet: session.input.snippet,
            turns: session.input.turns.map(t => ({ ...t })),
            createdAt: session.createdAt,
        };
    }
}
