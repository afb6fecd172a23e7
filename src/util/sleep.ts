import { ScrapeAbortedError } from './errors';

export type Sleep = (ms: number) => Promise<void>;

/**
 * Sleep bound to a cancellation signal. An abort rejects pending and future
 * sleeps with ScrapeAbortedError straight away.
 */
export function createSleep(signal?: AbortSignal): Sleep {
    return (ms: number) => new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new ScrapeAbortedError());
            return;
        }

        const onAbort = () => {
            clearTimeout(timeoutId);
            reject(new ScrapeAbortedError());
        };

        const timeoutId = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
