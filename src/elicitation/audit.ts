/**
 * Per-execution elicitation audit
 *
 * Wraps an elicitation handler so every handshake that happens during one
 * forwarded call is kept as an ElicitationRecord, in order. The records are
 * attached to that call's log entry.
 */

import _ from 'lodash';
import type {
    ElicitationHandler,
    ElicitationOutcome,
    ElicitationRecord,
    ElicitationRequest
} from '../types/elicitation.js';
import { parseRequestedSchema } from './schema.js';

export function toElicitationRecord(request: ElicitationRequest, outcome: ElicitationOutcome, resolvedAt: Date): ElicitationRecord {
    return {
        message:         request.message,
        fields:          parseRequestedSchema(request.requestedSchema),
        collectedValues: outcome.action === 'accept' ? { ...outcome.content } : { ...outcome.partial },
        skippedFields:   [...(outcome.skippedFields ?? [])],
        action:          outcome.action,
        timestamp:       resolvedAt.toISOString(),
    };
}

export class ElicitationAudit {
    private sequence: ElicitationRecord[] = [];

    constructor(private readonly now: () => Date = () => new Date()) {}

    get records(): readonly ElicitationRecord[] {
        return [...this.sequence];
    }

    /**
     * Handler that delegates to `handler` and records the outcome. A handler
     * that throws is recorded as `cancel` and the error is rethrown.
     */
    wrap(handler: ElicitationHandler): ElicitationHandler {
        return async (request) => {
            let outcome: ElicitationOutcome;
            try {
                outcome = await handler(request);
            } catch (error) {
                this.sequence.push(toElicitationRecord(request, { action: 'cancel' }, this.now()));
                throw error;
            }
            this.sequence.push(toElicitationRecord(request, outcome, this.now()));
            return outcome;
        };
    }
}

function describeResponse(record: ElicitationRecord): string {
    switch(record.action) {
        case 'accept':
            return `   ✓ Response: ${JSON.stringify(record.collectedValues, null, 2)} (accepted)`;
        case 'decline':
            return '   ✗ Response: (declined)';
        case 'cancel':
            return '   ⊘ Response: (cancelled)';
    }
}

/**
 * Request, elicitation(s) and final result as one readable block
 */
export function formatExecutionSummary(records: readonly ElicitationRecord[], resultText: string): string {
    const parts: string[] = [];
    if(records.length > 0) {
        parts.push('Execution Summary:');
        _.forEach(records, (record, index) => {
            parts.push('', `Elicitation #${index + 1}:`, `   Request: ${record.message}`, describeResponse(record));
        });
        parts.push('', '─'.repeat(50));
    }
    parts.push('Final Result:', resultText);
    return parts.join('\n');
}
