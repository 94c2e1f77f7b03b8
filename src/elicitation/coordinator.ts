/**
 * Elicitation Coordinator
 *
 * Bridges a backend call that is waiting on operator input and the
 * foreground that collects it. Each request becomes an ElicitationSession
 * whose `outcome` promise the backend call awaits; the foreground feeds the
 * session with `submit()` until it resolves.
 *
 * Session states:
 *   awaiting-schema -> collecting(index) | awaiting-value -> resolved(action)
 *
 * Requests that arrive while one is being answered wait in FIFO order.
 */

import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { ElicitationParseError, errorMessage } from '../utils/errors.js';
import type {
    ElicitationAction,
    ElicitationField,
    ElicitationHandler,
    ElicitationOutcome,
    ElicitationRequest
} from '../types/elicitation.js';
import {
    buildTypedContent,
    displayValue,
    fieldPrompt,
    parseFieldValue,
    parseRequestedSchema,
    reservedAction
} from './schema.js';

export type SessionState
    = | { readonly phase: 'awaiting-schema' }
      | { readonly phase: 'collecting', readonly index: number }
      | { readonly phase: 'awaiting-value' }
      | { readonly phase: 'resolved', readonly action: ElicitationAction };

export type SubmitResult
    = | { readonly status: 'accepted-field', readonly field: string, readonly value: unknown }
      | { readonly status: 'skipped-field', readonly field: string, readonly defaultValue?: unknown }
      | { readonly status: 'rejected', readonly field: string, readonly message: string }
      | { readonly status: 'invalid', readonly field: string, readonly message: string }
      | { readonly status: 'resolved', readonly action: ElicitationAction };

export class ElicitationSession {
    readonly fields: readonly ElicitationField[];
    readonly outcome: Promise<ElicitationOutcome>;

    private current: SessionState = { phase: 'awaiting-schema' };
    private collected: Record<string, unknown> = {};
    private skipped: string[] = [];
    private readonly settle: (outcome: ElicitationOutcome) => void;

    constructor(
        readonly id: number,
        readonly request: ElicitationRequest,
        private readonly onSettled?: (session: ElicitationSession) => void
    ) {
        this.fields = parseRequestedSchema(request.requestedSchema);

        let settle: (outcome: ElicitationOutcome) => void = _.noop;
        this.outcome = new Promise<ElicitationOutcome>((resolve) => {
            settle = resolve;
        });
        this.settle = settle;
    }

    get state(): SessionState {
        return this.current;
    }

    get isResolved(): boolean {
        return this.current.phase === 'resolved';
    }

    /** Values accepted so far, by field name */
    get collectedValues(): Readonly<Record<string, unknown>> {
        return { ...this.collected };
    }

    get skippedFields(): readonly string[] {
        return [...this.skipped];
    }

    /**
     * Read the schema and enter collection. Called when the session is
     * presented; later calls are no-ops.
     */
    begin(): void {
        if(this.current.phase === 'awaiting-schema') {
            this.current = this.fields.length > 0 ? { phase: 'collecting', index: 0 } : { phase: 'awaiting-value' };
        }
    }

    /** The field currently being asked for, if collecting */
    get currentField(): ElicitationField | undefined {
        return this.current.phase === 'collecting' ? this.fields[this.current.index] : undefined;
    }

    /**
     * Text shown to the operator for the current step
     */
    prompt(): string {
        const field = this.currentField;
        if(field) {
            return fieldPrompt(field);
        }
        if(this.current.phase === 'resolved') {
            return '';
        }
        return `${this.request.message}\nEnter a response, or press Enter to acknowledge`;
    }

    private resolve(outcome: ElicitationOutcome): SubmitResult {
        this.current = { phase: 'resolved', action: outcome.action };
        logger.info({ sessionId: this.id, action: outcome.action }, 'Elicitation resolved');
        this.settle(outcome);
        this.onSettled?.(this);
        return { status: 'resolved', action: outcome.action };
    }

    private abandon(action: 'decline' | 'cancel'): SubmitResult {
        return this.resolve({ action, partial: this.collectedValues, skippedFields: this.skippedFields });
    }

    private advance(index: number): SubmitResult | undefined {
        const next = index + 1;
        if(next < this.fields.length) {
            this.current = { phase: 'collecting', index: next };
            return undefined;
        }
        return this.resolve({
            action:        'accept',
            content:       buildTypedContent(this.request.requestedSchema, this.collected),
            skippedFields: this.skippedFields,
        });
    }

    private submitField(index: number, field: ElicitationField, input: string): SubmitResult {
        if(input === '') {
            if(field.required) {
                return { status: 'rejected', field: field.name, message: `${field.name} is required` };
            }
            const hasDefault = field.default !== undefined && field.default !== null;
            if(hasDefault) {
                this.collected[field.name] = field.default;
            } else {
                this.skipped.push(field.name);
            }
            return this.advance(index) ?? {
                status: 'skipped-field',
                field:  field.name,
                ...(hasDefault ? { defaultValue: field.default } : {}),
            };
        }

        let value: unknown;
        try {
            value = parseFieldValue(field, input);
        } catch (error) {
            const message = error instanceof ElicitationParseError ? error.message : `Invalid value for ${field.name}: ${errorMessage(error)}`;
            return { status: 'invalid', field: field.name, message };
        }

        this.collected[field.name] = value;
        logger.debug({ sessionId: this.id, field: field.name, value: displayValue(value) }, 'Elicitation field accepted');
        return this.advance(index) ?? { status: 'accepted-field', field: field.name, value };
    }

    /**
     * Feed one line of operator input
     */
    submit(rawInput: string): SubmitResult {
        this.begin();
        const state = this.current;
        if(state.phase === 'resolved') {
            return { status: 'resolved', action: state.action };
        }

        const input = rawInput.trim();
        const reserved = reservedAction(input);
        if(reserved) {
            return this.abandon(reserved);
        }

        if(state.phase === 'collecting') {
            const field = this.fields[state.index];
            if(field) {
                return this.submitField(state.index, field, input);
            }
        }

        // No fields: an empty line acknowledges, anything else is the value
        return this.resolve({ action: 'accept', content: input === '' ? {} : { value: input } });
    }

    /**
     * Resolve as `cancel` unless already resolved
     *
     * @returns whether this call resolved the session
     */
    cancel(): boolean {
        if(this.isResolved) {
            return false;
        }
        this.abandon('cancel');
        return true;
    }
}

export interface ElicitationCoordinatorOptions {
    /** Resolve a session as `cancel` after this long; off when absent or 0 */
    timeoutMs?: number
}

/** Called with the session now presented, or undefined when none is pending */
export type PresentationListener = (session: ElicitationSession | undefined) => void;

export class ElicitationCoordinator {
    private queue: ElicitationSession[] = [];
    private listeners: PresentationListener[] = [];
    private sequence = 0;
    private readonly timeoutMs: number;

    constructor(options: ElicitationCoordinatorOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? 0;
    }

    /** The session being answered */
    get current(): ElicitationSession | undefined {
        return this.queue[0];
    }

    get pendingCount(): number {
        return this.queue.length;
    }

    /**
     * The elicitation callback: queues the request and waits for the operator
     */
    readonly handle: ElicitationHandler = async (request) => {
        const session = new ElicitationSession(++this.sequence, request, settled => this.settled(settled));
        this.queue.push(session);
        logger.info({ sessionId: session.id, fieldCount: session.fields.length, queued: this.queue.length }, 'Elicitation requested');
        if(this.queue.length === 1) {
            this.present();
        }

        let timer: NodeJS.Timeout | undefined;
        if(this.timeoutMs > 0) {
            timer = setTimeout(() => {
                if(session.cancel()) {
                    logger.warn({ sessionId: session.id, timeoutMs: this.timeoutMs }, 'Elicitation timed out');
                }
            }, this.timeoutMs);
        }

        try {
            return await session.outcome;
        } finally {
            if(timer !== undefined) {
                clearTimeout(timer);
            }
        }
    };

    /**
     * Submit input to the current session
     *
     * @returns undefined when nothing is pending
     */
    submit(input: string): SubmitResult | undefined {
        return this.current?.submit(input);
    }

    /**
     * Cancel every pending session, current first
     *
     * @returns how many were cancelled
     */
    cancelPending(): number {
        let cancelled = 0;
        for(const session of [...this.queue]) {
            if(session.cancel()) {
                cancelled++;
            }
        }
        return cancelled;
    }

    /**
     * @returns a function that removes the listener
     */
    onChange(listener: PresentationListener): () => void {
        this.listeners.push(listener);
        return () => {
            _.pull(this.listeners, listener);
        };
    }

    private present(): void {
        const session = this.current;
        session?.begin();
        for(const listener of [...this.listeners]) {
            try {
                listener(session);
            } catch (error) {
                logger.warn({ error: errorMessage(error) }, 'Elicitation listener threw');
            }
        }
    }

    private settled(session: ElicitationSession): void {
        const wasCurrent = this.queue[0] === session;
        _.pull(this.queue, session);
        if(wasCurrent) {
            this.present();
        }
    }
}
