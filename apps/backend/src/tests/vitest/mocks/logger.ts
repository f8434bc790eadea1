import { vi } from 'vitest';
import type { ILogger } from '@meshstate/types';

/**
 * Logger double whose children log into the parent's spies, so assertions
 * can be made on the logger handed to the component under test.
 */
export class MockLogger implements ILogger {
    public fatal = vi.fn();
    public error = vi.fn();
    public warn = vi.fn();
    public info = vi.fn();
    public debug = vi.fn();
    public trace = vi.fn();
    public child = vi.fn((_bindings: Record<string, unknown>): ILogger => this);
}
