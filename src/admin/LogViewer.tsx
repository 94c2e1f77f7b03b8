/**
 * Log Viewer
 * Live tail of the operation log with summary statistics. Shows the newest
 * entries; `e` toggles errors only, `q` or Esc exits.
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import _ from 'lodash';
import type { OperationLog } from '../logging/operation-log.js';
import { LogEntryKind, entryStatus, type LogEntry } from '../types/log.js';
import { formatEntryLine, formatStats, statusColor } from './format.js';

interface LogViewerProps {
    log:       OperationLog
    title?:    string
    /** Entries shown at once (default 20) */
    maxRows?:  number
}

export function LogViewer({ log, title = 'Operation Log', maxRows = 20 }: LogViewerProps) {
    const { exit } = useApp();
    const [entries, setEntries] = useState<readonly LogEntry[]>(log.entries);
    const [errorsOnly, setErrorsOnly] = useState(false);

    useEffect(() => log.subscribe(() => {
        setEntries(log.entries);
    }), [log]);

    useInput((input, key) => {
        if(input === 'q' || key.escape) {
            exit();
        } else if(input === 'e') {
            setErrorsOnly(value => !value);
        }
    });

    const visible = _.takeRight(
        errorsOnly ? _.filter(entries, entry => entryStatus(entry) === 'ERROR') : entries,
        maxRows
    );
    const latestElicitations = _.findLast(entries, entry => entry.kind === LogEntryKind.ToolCall && (entry.elicitations?.length ?? 0) > 0);

    return (
        <Box flexDirection="column">
            <Text bold color="cyan">
                {title}
            </Text>
            <Text color="yellow">{formatStats(log.stats())}</Text>
            <Box flexDirection="column" marginTop={1}>
                {visible.length === 0
                    ? <Text dimColor>No entries</Text>
                    : _.map(visible, entry => (
                        <Text key={entry.id} color={statusColor(entryStatus(entry))}>
                            {formatEntryLine(entry)}
                        </Text>
                    ))}
            </Box>
            {latestElicitations?.elicitations && (
                <Box flexDirection="column" marginTop={1}>
                    <Text underline>
                        Elicitations of
                        {' '}
                        {latestElicitations.operationName}
                    </Text>
                    {_.map(latestElicitations.elicitations, (record, index) => (
                        <Text key={`${latestElicitations.id}-${index}`}>
                            {`${index + 1}. ${record.message} → ${record.action}`}
                        </Text>
                    ))}
                </Box>
            )}
            <Text dimColor>e: errors only • q/Esc: exit</Text>
        </Box>
    );
}
