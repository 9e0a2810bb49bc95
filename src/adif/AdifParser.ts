/**
 * ADIF record parser
 *
 * Reads `<NAME:LENGTH>data` tags into a ContactRecord. LENGTH counts UTF-8
 * bytes, as written by AdifWriter. Tag names are matched case-insensitively;
 * unknown tags are ignored. BAND is never read; normalization derives it
 * from FREQ.
 */

import { ParseError } from '../errors';
import type { ContactField, ContactRecord, ParseContext } from './types';

const TAG_PATTERN = /<([a-zA-Z_]+):(\d+)>/g;

// ADIF tag -> record fields it populates
const TAG_TO_FIELDS: Readonly<Record<string, readonly ContactField[]>> = {
    CALL: ['CALL'],
    MODE: ['MODE'],
    QSO_DATE_OFF: ['QSO_DATE_OFF', 'QSO_DATE'],
    QSO_DATE: ['QSO_DATE'],
    TIME_OFF: ['TIME_OFF', 'TIME_ON'],
    TIME_ON: ['TIME_ON'],
    RST_RCVD: ['RST_RCVD'],
    RST_SENT: ['RST_SENT'],
    FREQ: ['FREQ'],
    FREQ_RX: ['FREQ_RX'],
    OPERATOR: ['OPERATOR'],
    COMMENT: ['COMMENT'],
    TX_PWR: ['POWER'],
    STX: ['STX'],
    SRX: ['SRX'],
    STX_STRING: ['STX_STRING'],
    SRX_STRING: ['SRX_STRING'],
    RTX: ['RTX'],
    CONTEST_ID: ['CONTEST_ID'],
    PREFIX: ['PREFIX'],
    SUBMODE: ['SUBMODE'],
    QSLMSG: ['QSLMSG'],
    NOTES: ['NOTES'],
    EMAIL: ['EMAIL'],
    DARC_DOK: ['DARC_DOK'],
    SOTA_REF: ['SOTA_REF'],
    WWFF_REF: ['WWFF_REF'],
    POTA_REF: ['POTA_REF'],
    CNTY: ['CNTY'],
    REGION: ['REGION'],
    LAT: ['LAT'],
    LON: ['LON'],
    ANT_AZ: ['ANT_AZ'],
    ANT_EL: ['ANT_EL'],
    ANT_PATH: ['ANT_PATH'],
    A_INDEX: ['A_INDEX'],
    K_INDEX: ['K_INDEX'],
    SFI: ['SFI'],
    RX_PWR: ['RX_PWR'],
    MY_CALL: ['MYCALL', 'STATION_CALLSIGN'],
    MY_GRIDSQUARE: ['MY_GRIDSQUARE'],
    NAME: ['NAME'],
    QTH: ['QTH'],
    STATE: ['STATE'],
    COUNTRY: ['COUNTRY'],
    CQZ: ['CQZ'],
    ITUZ: ['ITUZ'],
    CONT: ['CONT'],
    IOTA: ['IOTA'],
    DXCC: ['DXCC'],
    PROP_MODE: ['PROP_MODE'],
    SAT_NAME: ['SAT_NAME'],
    SAT_MODE: ['SAT_MODE'],
    GRIDSQUARE: ['GRIDSQUARE'],
    STATION_CALLSIGN: ['STATION_CALLSIGN'],
};

export function parseAdifRecord(message: string, context: ParseContext = {}): ContactRecord {
    const record: ContactRecord = {};
    const bytes = Buffer.from(message, 'utf8');

    for (const match of message.matchAll(TAG_PATTERN)) {
        const [tag, name, lengthText] = match;

        // Data follows the first occurrence of this exact tag
        const fieldStart = bytes.indexOf(tag) + tag.length;
        if (fieldStart >= bytes.length) continue;

        const length = Number.parseInt(lengthText, 10);
        if (!Number.isSafeInteger(length)) continue;

        const fieldEnd = Math.min(fieldStart + length, bytes.length);
        const data = bytes.subarray(fieldStart, fieldEnd).toString('utf8').trim();

        const fields = TAG_TO_FIELDS[name.toUpperCase()];
        if (!fields) continue;

        for (const field of fields) {
            record[field] = data;
        }
    }

    if (!record.CALL) {
        throw new ParseError('missing required CALL field in ADIF');
    }

    if (context.verbose) {
        context.logger?.log(`Parsed ADIF QSO: ${record.CALL} on ${record.FREQ ?? ''} MHz`);
    }

    return record;
}
