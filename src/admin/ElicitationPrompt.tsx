/**
 * Elicitation Prompt
 * Collects operator input for the coordinator's current elicitation session,
 * one field at a time. `decline` or `cancel` typed at any prompt ends the
 * handshake; Esc cancels it.
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import type { ElicitationCoordinator, ElicitationSession, SubmitResult } from '../elicitation/coordinator.js';
import { displayValue } from '../elicitation/schema.js';

interface ElicitationPromptProps {
    coordinator: ElicitationCoordinator
}

interface Feedback {
    text:  string
    color: 'green' | 'red' | 'yellow'
}

function describe(result: SubmitResult): Feedback {
    switch(result.status) {
        case 'accepted-field':
            return { text: `✓ ${result.field} = ${displayValue(result.value)}`, color: 'green' };
        case 'skipped-field':
            return result.defaultValue === undefined
                ? { text: `Skipped ${result.field}`, color: 'yellow' }
                : { text: `Using default for ${result.field}: ${displayValue(result.defaultValue)}`, color: 'yellow' };
        case 'rejected':
        case 'invalid':
            return { text: result.message, color: 'red' };
        case 'resolved':
            return { text: `Elicitation resolved: ${result.action}`, color: result.action === 'accept' ? 'green' : 'yellow' };
    }
}

export function ElicitationPrompt({ coordinator }: ElicitationPromptProps) {
    const [session, setSession] = useState<ElicitationSession | undefined>(coordinator.current);
    const [input, setInput] = useState('');
    const [feedback, setFeedback] = useState<Feedback | undefined>(undefined);
    // Sessions change state in place; bump to re-render after each submit
    const [, setRevision] = useState(0);

    useEffect(() => coordinator.onChange((presented) => {
        setSession(presented);
        setInput('');
    }), [coordinator]);

    useInput((_input, key) => {
        if(key.escape && session) {
            session.cancel();
            setFeedback({ text: 'Elicitation cancelled', color: 'yellow' });
        }
    });

    if(!session) {
        return feedback ? <Text color={feedback.color}>{feedback.text}</Text> : null;
    }

    const handleSubmit = (value: string) => {
        const result = coordinator.submit(value);
        if(result) {
            setFeedback(describe(result));
        }
        setInput('');
        setRevision(revision => revision + 1);
    };

    const pending = coordinator.pendingCount - 1;

    return (
        <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
            <Text bold color="cyan">
                Input requested
            </Text>
            <Text>{session.request.message}</Text>
            {pending > 0 && (
                <Text color="yellow">
                    {pending}
                    {' '}
                    more request(s) waiting
                </Text>
            )}
            <Box marginTop={1} flexDirection="column">
                <Text>{session.prompt()}</Text>
            </Box>
            {feedback && <Text color={feedback.color}>{feedback.text}</Text>}
            <Box>
                <Text color="cyan">{'> '}</Text>
                <TextInput value={input} onChange={setInput} onSubmit={handleSubmit} />
            </Box>
            <Text dimColor>Enter: submit • Type decline or cancel to abort • Esc: cancel</Text>
        </Box>
    );
}
