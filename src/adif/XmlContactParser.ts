/**
 * Parser for the `contactinfo` XML broadcast (N1MM-style contact packets).
 *
 * Frequencies arrive in units of 10 Hz and are converted to MHz here;
 * USB/LSB are folded into SSB. Neither conversion applies to ADIF input.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ParseError } from '../errors';
import { parseDecimal } from './normalize';
import type { ContactRecord, ParseContext } from './types';

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;
const FREQ_DIVISOR = 100000;

const xmlParser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    trimValues: false,
});

interface ContactTimestamp {
    date: string;   // YYYYMMDD
    time: string;   // HHMMSS
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function scalarText(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return undefined;
}

// A repeated child parses to an array; the last occurrence wins
function childText(element: Record<string, unknown>, name: string): string {
    const value = element[name];
    if (Array.isArray(value)) {
        for (let i = value.length - 1; i >= 0; i--) {
            const text = scalarText(value[i]);
            if (text !== undefined) return text;
        }
        return '';
    }
    return scalarText(value) ?? '';
}

/**
 * Cut the payload down to the document itself: a leading BOM, whitespace or
 * stray text before the first tag is dropped, and so is anything after the
 * closing </contactinfo> (padding, NULs, a second packet).
 */
export function extractContactDocument(message: string): string {
    let document = message.replace(/^\uFEFF/, '');
    const start = document.indexOf('<');
    document = start === -1 ? '' : document.slice(start);

    const closeTag = '</contactinfo>';
    const end = document.indexOf(closeTag);
    return end === -1 ? document : document.slice(0, end + closeTag.length);
}

export function parseContactTimestamp(timestamp: string): ContactTimestamp {
    const match = timestamp.match(TIMESTAMP_PATTERN);
    if (!match) {
        throw new ParseError(`timestamp parsing failed: "${timestamp}" is not YYYY-MM-DDTHH:MM:SS`);
    }

    const [, year, month, day, hours, minutes, seconds] = match;
    const parsed = new Date(Date.UTC(
        Number(year), Number(month) - 1, Number(day),
        Number(hours), Number(minutes), Number(seconds),
    ));

    // Date.UTC rolls out-of-range parts over; reject instead
    const valid = parsed.getUTCFullYear() === Number(year)
        && parsed.getUTCMonth() === Number(month) - 1
        && parsed.getUTCDate() === Number(day)
        && parsed.getUTCHours() === Number(hours)
        && parsed.getUTCMinutes() === Number(minutes)
        && parsed.getUTCSeconds() === Number(seconds);
    if (!valid) {
        throw new ParseError(`timestamp parsing failed: "${timestamp}" is out of range`);
    }

    return {
        date: `${year}${month}${day}`,
        time: `${hours}${minutes}${seconds}`,
    };
}

function frequencyToMhz(value: string, label: string): string {
    const parsed = parseDecimal(value);
    if (parsed === null) {
        throw new ParseError(`${label} frequency parsing failed: "${value}"`);
    }
    return (parsed / FREQ_DIVISOR).toFixed(6);
}

export function parseXmlContact(message: string, context: ParseContext = {}): ContactRecord {
    const xml = extractContactDocument(message);
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        throw new ParseError(`XML parsing failed: ${validation.err.msg} (line ${validation.err.line})`);
    }

    const document: unknown = xmlParser.parse(xml);
    const contactInfo = isObject(document) ? document.contactinfo : undefined;
    if (contactInfo === undefined) {
        throw new ParseError('XML parsing failed: expected <contactinfo> element');
    }
    // <contactinfo/> parses to ''; treat it as an element with no children
    const info = isObject(contactInfo) ? contactInfo : {};

    const timestamp = parseContactTimestamp(childText(info, 'timestamp'));

    let mode = childText(info, 'mode');
    if (mode === 'USB' || mode === 'LSB') {
        mode = 'SSB';
    }

    const freq = frequencyToMhz(childText(info, 'txfreq'), 'TX');
    const freqRx = frequencyToMhz(childText(info, 'rxfreq'), 'RX');
    const myCall = childText(info, 'mycall');

    const record: ContactRecord = {
        CALL: childText(info, 'call'),
        MODE: mode,
        QSO_DATE_OFF: timestamp.date,
        QSO_DATE: timestamp.date,
        TIME_OFF: timestamp.time,
        TIME_ON: timestamp.time,
        RST_RCVD: childText(info, 'rcv'),
        RST_SENT: childText(info, 'snt'),
        FREQ: freq,
        FREQ_RX: freqRx,
        OPERATOR: childText(info, 'operator'),
        COMMENT: childText(info, 'comment'),
        POWER: childText(info, 'power'),
        STX: childText(info, 'sntnr'),
        RTX: childText(info, 'rcvnr'),
        MYCALL: myCall,
        GRIDSQUARE: childText(info, 'gridsquare'),
        STATION_CALLSIGN: myCall,
    };

    if (!record.CALL) {
        throw new ParseError('missing required <call> element in XML');
    }

    if (context.verbose) {
        context.logger?.log(`Parsed XML QSO: ${record.CALL} on ${record.FREQ} MHz`);
    }

    return record;
}
