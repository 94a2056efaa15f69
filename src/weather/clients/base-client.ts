import { ObservationDocument, SourceConfig } from '../types.js';

/**
 * Upstream rejects default client agents
 */
export const BROWSER_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/111.0.0.0 Safari/537.36';

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
    'User-Agent': BROWSER_USER_AGENT,
    'Accept-Encoding': 'gzip',
    'Accept': 'application/json',
};

export interface SourceFetcher {
    /**
     * Fetch and merge current conditions and forecast for one station.
     * Rejects with an AcquisitionError subclass.
     */
    fetch(source: SourceConfig, signal?: AbortSignal): Promise<ObservationDocument>;
}
