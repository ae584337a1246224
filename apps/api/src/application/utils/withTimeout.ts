import { CancelledError, ProviderError } from '../../domain/errors/AppError';

export interface TimeoutOptions {
    timeoutMs: number;
    signal?: AbortSignal;
    label: string;
}

/**
 * Runs `task` with an AbortSignal that fires when the timeout elapses or the
 * caller's signal aborts. A timeout surfaces as a ProviderError, an abort as
 * a CancelledError and any other failure of the task as a ProviderError.
 * Nothing is retried.
 */
export async function withTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    { timeoutMs, signal, label }: TimeoutOptions
): Promise<T> {
    if (signal?.aborted) {
        throw new CancelledError(`${label} cancelled`);
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new ProviderError(`${label} timed out after ${timeoutMs}ms`, true));
        }, timeoutMs);
    });

    const abortPromise = new Promise<never>((_, reject) => {
        if (!signal) return;
        onAbort = () => {
            controller.abort();
            reject(new CancelledError(`${label} cancelled`));
        };
        signal.addEventListener('abort', onAbort, { once: true });
    });

    const taskPromise = task(controller.signal).catch((error: unknown) => {
        if (error instanceof ProviderError || error instanceof CancelledError) {
            throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ProviderError(`${label} failed: ${message}`, false, error);
    });

    try {
        return await Promise.race([taskPromise, timeoutPromise, abortPromise]);
    } finally {
        clearTimeout(timer);
        if (signal && onAbort) {
            signal.removeEventListener('abort', onAbort);
        }
    }
}
