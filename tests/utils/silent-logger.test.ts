/**
 * Tests for the dynamic logger: stderr normally, silent in console mode
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import _ from 'lodash';
import { dynamicLogger } from '../../src/utils/silent-logger.js';

describe('dynamicLogger', () => {
    let originalConsoleMode: string | undefined;
    let stderrSpy: MockInstance<typeof process.stderr.write>;
    let stdoutSpy: MockInstance<typeof process.stdout.write>;

    beforeEach(() => {
        originalConsoleMode = process.env.CONSOLE_MODE;
        stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(_.constant(true));
        stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(_.constant(true));
    });

    afterEach(() => {
        if(originalConsoleMode === undefined) {
            delete process.env.CONSOLE_MODE;
        } else {
            process.env.CONSOLE_MODE = originalConsoleMode;
        }
        vi.restoreAllMocks();
    });

    function stderrText(): string {
        return _.map(stderrSpy.mock.calls, call => String(call[0])).join('');
    }

    it('writes structured lines to stderr only', async () => {
        delete process.env.CONSOLE_MODE;

        dynamicLogger.error({ serverName: 'files' }, 'stderr check');

        await vi.waitFor(() => {
            expect(stderrText()).toContain('stderr check');
        });
        expect(stderrText()).toContain('"serverName":"files"');
        expect(stdoutSpy).not.toHaveBeenCalled();
    });

    it('is silent while the console owns the terminal', async () => {
        process.env.CONSOLE_MODE = 'true';

        dynamicLogger.error('console mode check');
        await new Promise(resolve => setImmediate(resolve));

        expect(stderrText()).not.toContain('console mode check');
        expect(stdoutSpy).not.toHaveBeenCalled();
    });

    it('picks the logger again on every call', async () => {
        process.env.CONSOLE_MODE = 'true';
        dynamicLogger.error('while silent');
        delete process.env.CONSOLE_MODE;
        dynamicLogger.error('after console exit');

        await vi.waitFor(() => {
            expect(stderrText()).toContain('after console exit');
        });
        expect(stderrText()).not.toContain('while silent');
    });

    it('chains', () => {
        process.env.CONSOLE_MODE = 'true';

        expect(dynamicLogger.debug('a').info('b')).toBe(dynamicLogger);
    });
});
