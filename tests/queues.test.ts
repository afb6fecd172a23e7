// Mock the dependencies BEFORE import
jest.mock('p-queue', () => {
    return jest.fn().mockImplementation((options) => {
        return { concurrency: options?.concurrency || 1, add: jest.fn() };
    });
});

jest.mock('bottleneck', () => {
    return jest.fn().mockImplementation((options) => {
        return {
            maxConcurrent: options?.maxConcurrent,
            minTime: options?.minTime,
            on: jest.fn(),
            schedule: jest.fn((task: () => Promise<unknown>) => task())
        };
    });
});

jest.mock('../src/util/logger', () => ({
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

// Import AFTER mocking
import { createItemQueue, createRateLimitedTransport, createScraperLimiter } from '../src/util/queues';
import { HttpTransport } from '../src/util/http';
import PQueue from 'p-queue';
import Bottleneck from 'bottleneck';

describe('Queue Configuration', () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    describe('createItemQueue (P-Queue)', () => {
        it('should be instantiated with the configured concurrency', () => {
            const queue = createItemQueue(2);

            expect(PQueue).toHaveBeenCalledWith(expect.objectContaining({
                concurrency: 2
            }));
            expect(queue.concurrency).toBe(2);
        });
    });

    describe('createScraperLimiter (Bottleneck)', () => {
        it('should cap requests in flight and keep a minimum gap', () => {
            createScraperLimiter({ concurrency: 3 });

            expect(Bottleneck).toHaveBeenCalledWith({
                maxConcurrent: 3,
                minTime: 200
            });
        });

        it('should register error and failed handlers', () => {
            const limiter = createScraperLimiter({ concurrency: 1 });
            const events = (limiter.on as unknown as jest.Mock).mock.calls.map(call => call[0]);

            expect(events).toEqual(['error', 'failed']);
        });

        it('should leave retries to the fetcher', () => {
            const limiter = createScraperLimiter({ concurrency: 1 });
            const failedCall = (limiter.on as unknown as jest.Mock).mock.calls.find(call => call[0] === 'failed');
            const handler: (err: unknown) => unknown = failedCall[1];

            expect(handler(new Error('boom'))).toBeNull();
        });
    });

    describe('createRateLimitedTransport', () => {
        it('should route every request through the limiter', async () => {
            const limiter = createScraperLimiter({ concurrency: 1 });
            const inner: HttpTransport = {
                get: jest.fn().mockResolvedValue({ status: 200, body: '<p>ok</p>' }),
            };
            const transport = createRateLimitedTransport(inner, limiter, 'Schedule');

            const response = await transport.get('https://example.test/', { Accept: 'text/html' }, 1000);

            expect(response).toEqual({ status: 200, body: '<p>ok</p>' });
            expect(limiter.schedule).toHaveBeenCalledTimes(1);
            expect(inner.get).toHaveBeenCalledWith('https://example.test/', { Accept: 'text/html' }, 1000, undefined);
        });

        it('should pass transport errors through', async () => {
            const limiter = createScraperLimiter({ concurrency: 1 });
            const inner: HttpTransport = {
                get: jest.fn().mockRejectedValue(new Error('socket hang up')),
            };
            const transport = createRateLimitedTransport(inner, limiter, 'Schedule');

            await expect(transport.get('https://example.test/', {}, 1000)).rejects.toThrow('socket hang up');
        });
    });
});
