import fetch from 'node-fetch';
import { logger } from '../logger';

export const DESCRIPTION_FETCH_TIMEOUT_MS = 30000;

/**
 * Fetches content from an HTTP URL
 * @param url The URL to fetch content from
 * @param timeoutMs Bound on the whole exchange, body included
 * @returns The content as a string
 */
export async function fetchFromUrl(url: string, timeoutMs = DESCRIPTION_FETCH_TIMEOUT_MS): Promise<string> {
    logger.info(`Fetching API description from URL: ${url}`);
    const response = await fetch(url, {
        headers: { Accept: 'application/json, application/yaml, text/yaml, */*' },
        timeout: timeoutMs,
    });

    if (!response.ok) {
        throw new Error(`HTTP error! status: ${response.status} - ${response.statusText}`);
    }

    const content = await response.text();
    logger.info(`Fetched ${content.length} bytes from ${url}`);
    return content;
}

/**
 * Checks if a string is an HTTP or HTTPS URL
 */
export function isHttpUrl(urlOrPath: string): boolean {
    return urlOrPath.startsWith('http://') || urlOrPath.startsWith('https://');
}
