/**
 * Tests for the coordinator lifecycle: first refresh, failover, stale data,
 * health transitions and the refresh schedule
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { logger } from '../logger.js';
import { HttpError, NotReadyError, TimeoutError } from '../weather/errors.js';
import { PwsCoordinator } from '../weather/index.js';
import { RefreshOutcome, SourceState } from '../weather/types.js';
import {
    BACKUP,
    FakeFetcher,
    PRIMARY,
    currentPayload,
    fakeHttp,
    json,
    makeConfig,
    wundergroundRoutes,
} from './fixtures.js';

jest.mock('../logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
    rateLimitedLogger: {
        warn: jest.fn(),
    },
}));

describe('PwsCoordinator', () => {
    let fetcher: FakeFetcher;
    let coordinator: PwsCoordinator;

    beforeEach(() => {
        jest.clearAllMocks();
        fetcher = new FakeFetcher();
        coordinator = new PwsCoordinator(makeConfig(), { fetcher });
    });

    afterEach(() => {
        coordinator.dispose();
        jest.useRealTimers();
    });

    it('should refuse a group without stations', () => {
        expect(() => new PwsCoordinator(makeConfig({ sources: [] }), { fetcher })).toThrow(
            'A coordinator needs at least one station'
        );
    });

    describe('first refresh', () => {
        it('should become ready when a station delivers data', async () => {
            expect(coordinator.isReady()).toBe(false);

            const outcome = await coordinator.firstRefresh();

            expect(outcome.succeeded).toBe(true);
            expect(outcome.activeSourceId).toBe('KXXTEST1');
            expect(coordinator.isReady()).toBe(true);
            expect(coordinator.lastRefreshSucceeded()).toBe(true);
            expect(coordinator.health()).toBe('healthy');
            expect(coordinator.getCondition('temp')).toBe(14.2);
        });

        it('should reject with NotReadyError when every station fails', async () => {
            fetcher.behaviour = {
                KXXTEST1: { fail: new HttpError(500, '', 'KXXTEST1') },
                KXXTEST2: { fail: new TimeoutError(10000, 'KXXTEST2') },
            };

            const failure = coordinator.firstRefresh();

            await expect(failure).rejects.toBeInstanceOf(NotReadyError);
            await expect(failure).rejects.toThrow(
                'No station delivered data on the first refresh (KXXTEST1: HTTP 500; KXXTEST2: Request timed out after 10000ms)'
            );
            expect(coordinator.isReady()).toBe(false);
            expect(coordinator.activeSourceId()).toBeNull();
            expect(coordinator.getCondition('temp')).toBeUndefined();
        });

        it('should become ready on a later refresh after a failed first one', async () => {
            fetcher.behaviour = {
                KXXTEST1: { fail: new HttpError(500, '') },
                KXXTEST2: { fail: new HttpError(500, '') },
            };
            await expect(coordinator.firstRefresh()).rejects.toBeInstanceOf(NotReadyError);

            fetcher.behaviour = {};
            const outcome = await coordinator.refresh();

            expect(outcome.succeeded).toBe(true);
            expect(coordinator.isReady()).toBe(true);
        });
    });

    describe('failover and stale data', () => {
        it('should fail over to the backup station', async () => {
            await coordinator.firstRefresh();
            fetcher.behaviour = { KXXTEST1: { fail: new HttpError(502, '') } };

            const outcome = await coordinator.refresh();

            expect(outcome.succeeded).toBe(true);
            expect(outcome.activeSourceId).toBe('KXXTEST2');
            expect(coordinator.getCondition('stationID')).toBe('KXXTEST2');
            expect(coordinator.health()).toBe('healthy');
        });

        it('should return to the primary station once it recovers', async () => {
            fetcher.behaviour = { KXXTEST1: { fail: new HttpError(502, '') } };
            await coordinator.firstRefresh();
            expect(coordinator.activeSourceId()).toBe('KXXTEST2');

            fetcher.behaviour = {};
            await coordinator.refresh();

            expect(coordinator.activeSourceId()).toBe('KXXTEST1');
        });

        it('should keep serving the last document when every station fails', async () => {
            await coordinator.firstRefresh();
            fetcher.behaviour = {
                KXXTEST1: { fail: new HttpError(500, '') },
                KXXTEST2: { fail: new HttpError(500, '') },
            };

            const outcome = await coordinator.refresh();

            expect(outcome.succeeded).toBe(false);
            expect(outcome.activeSourceId).toBe('KXXTEST1');
            expect(coordinator.activeSourceId()).toBe('KXXTEST1');
            expect(coordinator.getCondition('temp')).toBe(14.2);
            expect(coordinator.lastRefreshSucceeded()).toBe(false);
            expect(coordinator.isReady()).toBe(true);
            expect(coordinator.isDegraded()).toBe(true);
            expect(coordinator.health()).toBe('degraded');
        });

        it('should report every station in priority order', async () => {
            fetcher.behaviour = { KXXTEST1: { fail: new HttpError(500, '') } };
            await coordinator.firstRefresh();

            const statuses = coordinator.sourceStatuses();

            expect(Object.keys(statuses)).toEqual(['KXXTEST1', 'KXXTEST2']);
            expect(statuses.KXXTEST1).toEqual({
                name: 'Primary',
                priority: 1,
                isActive: false,
                lastSuccessTime: null,
                state: 'OFFLINE',
                lastError: 'HTTP 500',
                consecutiveFailures: 1,
            });
            expect(statuses.KXXTEST2).toMatchObject({
                name: 'Backup',
                priority: 2,
                isActive: true,
                state: 'ONLINE',
                lastError: null,
                consecutiveFailures: 0,
            });
            expect(statuses.KXXTEST2.lastSuccessTime).toBeInstanceOf(Date);
        });
    });

    it('should report stations in priority order whatever the configured order', async () => {
        coordinator = new PwsCoordinator(makeConfig({ sources: [BACKUP, PRIMARY] }), { fetcher });

        await coordinator.firstRefresh();

        expect(coordinator.config.sources.map(s => s.id)).toEqual(['KXXTEST1', 'KXXTEST2']);
        expect(Object.keys(coordinator.sourceStatuses())).toEqual(['KXXTEST1', 'KXXTEST2']);
        expect(coordinator.activeSourceId()).toBe('KXXTEST1');
    });

    describe('events and health', () => {
        it('should announce station state changes', async () => {
            const changes: [string, SourceState, SourceState][] = [];
            coordinator.on('sourceStatusChanged', (id, from, to) => changes.push([id, from, to]));

            await coordinator.firstRefresh();
            fetcher.behaviour = { KXXTEST1: { fail: new HttpError(500, '') } };
            await coordinator.refresh();
            await coordinator.refresh();

            expect(changes).toEqual([
                ['KXXTEST1', 'UNKNOWN', 'ONLINE'],
                ['KXXTEST2', 'UNKNOWN', 'ONLINE'],
                ['KXXTEST1', 'ONLINE', 'OFFLINE'],
            ]);
        });

        it('should move from degraded to failing and back to healthy', async () => {
            coordinator = new PwsCoordinator(makeConfig({ failureThreshold: 2 }), { fetcher });
            const events: string[] = [];
            coordinator.on('refreshed', () => events.push('refreshed'));
            coordinator.on('refreshFailed', () => events.push('refreshFailed'));
            coordinator.on('degraded', () => events.push('degraded'));
            coordinator.on('failing', count => events.push(`failing:${count}`));
            coordinator.on('recovered', () => events.push('recovered'));

            await coordinator.firstRefresh();
            fetcher.behaviour = {
                KXXTEST1: { fail: new HttpError(500, '') },
                KXXTEST2: { fail: new HttpError(500, '') },
            };

            await coordinator.refresh();
            expect(coordinator.health()).toBe('degraded');
            await coordinator.refresh();
            expect(coordinator.health()).toBe('failing');
            await coordinator.refresh();
            expect(coordinator.health()).toBe('failing');

            fetcher.behaviour = {};
            await coordinator.refresh();

            expect(coordinator.health()).toBe('healthy');
            expect(events).toEqual([
                'refreshed',
                'refreshFailed',
                'degraded',
                'refreshFailed',
                'failing:2',
                'refreshFailed',
                'refreshed',
                'recovered',
            ]);
            expect(logger.error).toHaveBeenCalledWith('Station group test-group has failed 2 consecutive refreshes', {
                staleSource: 'KXXTEST1',
            });
        });
    });

    describe('single flight', () => {
        it('should join a refresh that is already running', async () => {
            fetcher.behaviour = { KXXTEST1: { delayMs: 20 }, KXXTEST2: { delayMs: 20 } };

            const first = coordinator.refresh();
            const second = coordinator.refresh();

            expect(second).toBe(first);
            expect(coordinator.schedulerState()).toBe('REFRESHING');
            await first;
            expect(coordinator.schedulerState()).toBe('IDLE');
            expect(fetcher.calls).toEqual(['KXXTEST1', 'KXXTEST2']);
        });

        it('should start a new cycle after the previous one completes', async () => {
            const first = coordinator.refresh();
            await first;

            const second = coordinator.refresh();

            expect(second).not.toBe(first);
            await second;
            expect(fetcher.calls).toHaveLength(4);
        });
    });

    describe('schedule', () => {
        it('should refresh once per interval until stopped', async () => {
            jest.useFakeTimers();
            coordinator.start();

            await jest.advanceTimersByTimeAsync(299999);
            expect(fetcher.calls).toHaveLength(0);

            await jest.advanceTimersByTimeAsync(1);
            expect(fetcher.calls).toEqual(['KXXTEST1', 'KXXTEST2']);

            await jest.advanceTimersByTimeAsync(300000);
            expect(fetcher.calls).toHaveLength(4);

            coordinator.stop();
            await jest.advanceTimersByTimeAsync(600000);
            expect(fetcher.calls).toHaveLength(4);
        });

        it('should keep the schedule running after a failed cycle', async () => {
            jest.useFakeTimers();
            fetcher.behaviour = {
                KXXTEST1: { fail: new HttpError(500, '') },
                KXXTEST2: { fail: new HttpError(500, '') },
            };
            coordinator.start();

            await jest.advanceTimersByTimeAsync(600000);

            expect(fetcher.calls).toHaveLength(4);
            expect(coordinator.health()).toBe('degraded');
        });
    });

    describe('dispose', () => {
        it('should reject refreshes after dispose', async () => {
            coordinator.dispose();

            await expect(coordinator.refresh()).rejects.toThrow('Coordinator has been disposed');
        });

        it('should drop the result of a cycle that was running during dispose', async () => {
            fetcher.behaviour = { KXXTEST1: { delayMs: 20 }, KXXTEST2: { delayMs: 20 } };

            const running = coordinator.refresh();
            coordinator.dispose();
            const outcome: RefreshOutcome = await running;

            expect(outcome.succeeded).toBe(false);
            expect(outcome.activeSourceId).toBeNull();
            expect(coordinator.activeSourceId()).toBeNull();
            expect(coordinator.isReady()).toBe(false);
        });
    });
});

describe('PwsCoordinator over HTTP', () => {
    it('should fail over from a broken primary station end to end', async () => {
        const { client, calls } = fakeHttp(wundergroundRoutes({
            [PRIMARY.id]: { status: 500, body: '' },
            [BACKUP.id]: json(currentPayload(BACKUP.id)),
        }));
        const coordinator = new PwsCoordinator(makeConfig({ numericPrecision: 'decimal' }), { httpClient: client });

        await coordinator.firstRefresh();

        expect(calls).toContain(
            'https://api.weather.com/v2/pws/observations/current?stationId=KXXTEST1&numericPrecision=decimal&format=json&apiKey=test-key&units=m'
        );
        expect(coordinator.activeSourceId()).toBe('KXXTEST2');
        expect(coordinator.coordinates()).toEqual({ lat: 47.21, lon: 18.62 });
        expect(coordinator.getCondition('temp')).toBe(14.2);
        expect(coordinator.currentCondition()).toBe('partlycloudy');
        expect(coordinator.attribution()).toBe('Data provided by Weather Underground PWS KXXTEST2 (Backup)');
        expect(coordinator.sourceStatuses().KXXTEST1.lastError).toBe('HTTP 500');

        coordinator.dispose();
    });
});
