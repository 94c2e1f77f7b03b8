/**
 * Call Screen
 * Runs one forwarded tool call with the elicitation coordinator answering any
 * backend requests for input, then shows the execution summary.
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import type { ProxyControlPlane } from '../backend/proxy.js';
import type { ElicitationCoordinator, ElicitationSession } from '../elicitation/coordinator.js';
import { ElicitationAudit, formatExecutionSummary } from '../elicitation/audit.js';
import { errorMessage } from '../utils/errors.js';
import { ElicitationPrompt } from './ElicitationPrompt.js';
import { resultText } from './format.js';

interface CallScreenProps {
    control:     ProxyControlPlane
    coordinator: ElicitationCoordinator
    toolName:    string
    args:        Record<string, unknown>
    /** Called with the summary once the call has finished */
    onDone?:     (summary: string, failed: boolean) => void
}

type CallState
    = | { phase: 'running' }
      | { phase: 'done', summary: string }
      | { phase: 'failed', summary: string };

export function CallScreen({ control, coordinator, toolName, args, onDone }: CallScreenProps) {
    const { exit } = useApp();
    const [state, setState] = useState<CallState>({ phase: 'running' });
    const [session, setSession] = useState<ElicitationSession | undefined>(coordinator.current);

    useEffect(() => coordinator.onChange(setSession), [coordinator]);

    useEffect(() => {
        const audit = new ElicitationAudit();
        void (async () => {
            try {
                const result = await control.callTool(toolName, args, audit.wrap(coordinator.handle));
                const summary = formatExecutionSummary(audit.records, resultText(result));
                setState({ phase: 'done', summary });
                onDone?.(summary, result.isError === true);
            } catch (error) {
                const summary = formatExecutionSummary(audit.records, `Error: ${errorMessage(error)}`);
                setState({ phase: 'failed', summary });
                onDone?.(summary, true);
            }
        })();
        return () => {
            coordinator.cancelPending();
        };
        // The call runs once per mount
        // eslint-disable-next-line react-hooks/exhaustive-deps
    }, []);

    useInput((input, key) => {
        if(state.phase !== 'running' && (input === 'q' || key.return || key.escape)) {
            exit();
        }
    });

    return (
        <Box flexDirection="column">
            <Text bold color="cyan">
                Calling
                {' '}
                {toolName}
            </Text>
            {state.phase === 'running' && !session && <Text color="yellow">Waiting for the backend...</Text>}
            {state.phase === 'running' && session && <ElicitationPrompt coordinator={coordinator} />}
            {state.phase !== 'running' && (
                <Box flexDirection="column" marginTop={1}>
                    <Text color={state.phase === 'failed' ? 'red' : undefined}>{state.summary}</Text>
                    <Text dimColor>Press Enter, q or Esc to exit</Text>
                </Box>
            )}
        </Box>
    );
}
