import { describe, it, expect, vi } from 'vitest';
import { withTimeout } from '../src/application/utils/withTimeout';
import { CancelledError, ProviderError } from '../src/domain/errors/AppError';

describe('withTimeout', () => {
    it('should resolve with the task result', async () => {
        await expect(withTimeout(async () => 42, { timeoutMs: 100, label: 'Task' })).resolves.toBe(42);
    });

    it('should fail with a timed-out provider error and abort the task signal', async () => {
        let taskSignal: AbortSignal | undefined;

        const promise = withTimeout(signal => {
            taskSignal = signal;
            return new Promise<number>(() => {});
        }, { timeoutMs: 10, label: 'Embedding request' });

        await expect(promise).rejects.toMatchObject({
            message: 'Embedding request timed out after 10ms',
            timedOut: true,
            statusCode: 504,
        });
        expect(taskSignal?.aborted).toBe(true);
    });

    it('should wrap task failures in a provider error', async () => {
        const cause = new Error('connection refused');

        const error = await withTimeout(() => Promise.reject(cause), { timeoutMs: 100, label: 'Task' })
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ProviderError);
        expect(error).toMatchObject({ message: 'Task failed: connection refused', timedOut: false, reason: cause });
    });

    it('should pass provider errors through unchanged', async () => {
        const original = new ProviderError('quota exceeded');

        await expect(withTimeout(() => Promise.reject(original), { timeoutMs: 100, label: 'Task' }))
            .rejects.toBe(original);
    });

    it('should cancel when the caller aborts', async () => {
        const controller = new AbortController();

        const promise = withTimeout(() => new Promise<number>(() => {}), {
            timeoutMs: 1000,
            signal: controller.signal,
            label: 'Task',
        });
        controller.abort();

        await expect(promise).rejects.toThrow(CancelledError);
    });

    it('should not start the task when already aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const task = vi.fn(async () => 1);

        await expect(withTimeout(task, { timeoutMs: 100, signal: controller.signal, label: 'Task' }))
            .rejects.toThrow(CancelledError);
        expect(task).not.toHaveBeenCalled();
    });
});
