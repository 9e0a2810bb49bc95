import { ADIF_EOR } from '../adif/AdifWriter';
import type { PayloadFormat } from '../adif/types';

/**
 * Any payload containing "xml" (case-sensitive) is treated as contactinfo XML.
 * ADIF free text that happens to contain "xml" is misdetected.
 */
export function detectFormat(payload: string): PayloadFormat {
    return payload.includes('xml') ? 'xml' : 'adif';
}

/**
 * Split a batch of ADIF records on <EOR>. Segments are trimmed, empty ones dropped,
 * and every segment that was followed by a delimiter gets it back.
 */
export function splitAdifRecords(payload: string): string[] {
    if (!payload.includes(ADIF_EOR)) {
        return [payload];
    }

    const segments = payload.split(ADIF_EOR);
    const records: string[] = [];

    segments.forEach((segment, index) => {
        const trimmed = segment.trim();
        if (trimmed === '') return;
        records.push(index < segments.length - 1 ? trimmed + ADIF_EOR : trimmed);
    });

    return records;
}
