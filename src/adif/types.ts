/**
 * Contact record types
 *
 * A ContactRecord is one QSO as it moves through the pipeline:
 * - filled by exactly one parser (ADIF or contactinfo XML)
 * - normalized once (POWER, BAND)
 * - serialized once and discarded
 *
 * Keys follow ADIF naming, except POWER (written as TX_PWR) and
 * MYCALL (written as MY_CALL).
 */

import type { Logger } from '../utils/logger';

export const CONTACT_FIELDS = [
    'CALL',
    'MODE',
    'QSO_DATE_OFF',
    'QSO_DATE',
    'TIME_OFF',
    'TIME_ON',
    'RST_RCVD',
    'RST_SENT',
    'FREQ',
    'FREQ_RX',
    'OPERATOR',
    'COMMENT',
    'POWER',
    'STX',
    'SRX',
    'STX_STRING',
    'SRX_STRING',
    'RTX',
    'MYCALL',
    'GRIDSQUARE',
    'MY_GRIDSQUARE',
    'STATION_CALLSIGN',
    'BAND',
    'NAME',
    'QTH',
    'STATE',
    'COUNTRY',
    'CQZ',
    'ITUZ',
    'CONT',
    'IOTA',
    'DXCC',
    'PROP_MODE',
    'SAT_NAME',
    'SAT_MODE',
    // Contest fields
    'CONTEST_ID',
    'PREFIX',
    // Additional Wavelog-supported fields
    'SUBMODE',
    'QSLMSG',
    'NOTES',
    'EMAIL',
    'DARC_DOK',
    'SOTA_REF',
    'WWFF_REF',
    'POTA_REF',
    'CNTY',
    'REGION',
    'LAT',
    'LON',
    'ANT_AZ',
    'ANT_EL',
    'ANT_PATH',
    'A_INDEX',
    'K_INDEX',
    'SFI',
    'RX_PWR',
] as const;

export type ContactField = typeof CONTACT_FIELDS[number];

export type ContactRecord = Partial<Record<ContactField, string>>;

export type PayloadFormat = 'xml' | 'adif';

/**
 * Diagnostics hook passed into parsers instead of process-wide state
 */
export interface ParseContext {
    logger?: Logger;
    verbose?: boolean;
}

export interface BandTableEntry {
    name: string;
    lowerMhz: number;   // inclusive
    upperMhz: number;   // inclusive
}
