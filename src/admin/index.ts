/**
 * Operator Console
 *
 * This module is responsible for:
 * - Rendering the live operation log viewer
 * - Running a forwarded tool call interactively, answering elicitations
 * - Silencing the stderr logger while ink owns the terminal
 */

import React from 'react';
import { render } from 'ink';
import type { ProxyControlPlane } from '../backend/proxy.js';
import type { OperationLog } from '../logging/operation-log.js';
import type { ElicitationCoordinator } from '../elicitation/coordinator.js';
import { LogViewer } from './LogViewer.js';
import { CallScreen } from './CallScreen.js';

/**
 * Render an element until the app exits, with console mode on
 */
async function runConsole(element: React.ReactElement): Promise<void> {
    const previous = process.env.CONSOLE_MODE;
    // Read by the dynamic logger in silent-logger.ts
    process.env.CONSOLE_MODE = 'true';
    try {
        const { waitUntilExit } = render(element);
        await waitUntilExit();
    } finally {
        if(previous === undefined) {
            delete process.env.CONSOLE_MODE;
        } else {
            process.env.CONSOLE_MODE = previous;
        }
    }
}

export async function runLogViewer(log: OperationLog, title?: string): Promise<void> {
    await runConsole(React.createElement(LogViewer, { log, ...(title ? { title } : {}) }));
}

/**
 * Run one tool call in the console
 *
 * @returns the execution summary and whether the call failed
 */
export async function runCallScreen(
    control: ProxyControlPlane,
    coordinator: ElicitationCoordinator,
    toolName: string,
    args: Record<string, unknown>
): Promise<{ summary: string, failed: boolean }> {
    let outcome = { summary: '', failed: false };
    await runConsole(React.createElement(CallScreen, {
        control,
        coordinator,
        toolName,
        args,
        onDone: (summary: string, failed: boolean) => {
            outcome = { summary, failed };
        },
    }));
    return outcome;
}
