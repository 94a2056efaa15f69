/**
 * Fallback Selector
 * Fetches every configured station in the cycle, records each outcome and
 * picks the highest-priority station that succeeded.
 *
 * All stations are fetched even when the first one succeeds so the status
 * view stays complete; this costs one extra pair of calls per backup station.
 */

import { logger } from '../logger.js';
import { CoordinatorState } from '../realtime/coordinator-state.js';
import { SourceFetcher } from './clients/base-client.js';
import { AcquisitionError, toAcquisitionError } from './errors.js';
import { ActiveSelection, ObservationDocument, SourceConfig } from './types.js';

export interface SelectionResult {
    /** Null when no station succeeded in this cycle */
    active: ActiveSelection | null;
    succeeded: SourceConfig[];
    failures: Map<string, AcquisitionError>;
}

type FetchOutcome =
    | { source: SourceConfig; ok: true; document: ObservationDocument }
    | { source: SourceConfig; ok: false; error: AcquisitionError };

export class FallbackSelector {
    constructor(
        private readonly fetcher: SourceFetcher,
        private readonly state: CoordinatorState
    ) {}

    async selectActive(sources: readonly SourceConfig[], signal?: AbortSignal): Promise<SelectionResult> {
        // Concurrent: a cycle takes as long as the slowest station, not the sum
        const outcomes = await Promise.all(sources.map(source => this.attempt(source, signal)));
        const completedAt = new Date();

        const succeeded: SourceConfig[] = [];
        const documents = new Map<string, ObservationDocument>();
        const failures = new Map<string, AcquisitionError>();

        for (const outcome of outcomes) {
            if (outcome.ok) {
                this.state.recordSuccess(outcome.source, outcome.document, completedAt);
                succeeded.push(outcome.source);
                documents.set(outcome.source.id, outcome.document);
            } else {
                this.state.recordFailure(outcome.source, outcome.error, completedAt);
                failures.set(outcome.source.id, outcome.error);
            }
        }

        // Priority order, configuration order on ties; never arrival order
        const ranked = rankByPriority(sources, succeeded);
        const best = ranked[0];
        const bestDocument = best ? documents.get(best.id) : undefined;

        if (!best || !bestDocument) {
            logger.error('No stations available - all stations failed', {
                stations: sources.map(s => s.id),
            });
            return { active: null, succeeded: ranked, failures };
        }

        logger.info(`Using data from station ${best.id} (${best.displayName})`);
        return { active: { source: best, document: bestDocument }, succeeded: ranked, failures };
    }

    private async attempt(source: SourceConfig, signal?: AbortSignal): Promise<FetchOutcome> {
        try {
            const document = await this.fetcher.fetch(source, signal);
            logger.debug(`Successfully fetched data from station ${source.id}`);
            return { source, ok: true, document };
        } catch (error) {
            const classified = toAcquisitionError(error, source.id);
            logger.warn(`Failed to fetch data from station ${source.id}: ${classified.message}`, {
                error: classified.name,
            });
            return { source, ok: false, error: classified };
        }
    }
}

/**
 * Order `subset` by priority, breaking ties by position in `configured`
 */
export function rankByPriority(configured: readonly SourceConfig[], subset: readonly SourceConfig[]): SourceConfig[] {
    const position = new Map(configured.map((source, index) => [source.id, index]));
    return [...subset].sort((a, b) =>
        a.priority - b.priority ||
        (position.get(a.id) ?? 0) - (position.get(b.id) ?? 0)
    );
}
