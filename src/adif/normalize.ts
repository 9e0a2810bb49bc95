import type { BandTableEntry, ContactRecord } from './types';

// Amateur bands in MHz, bounds inclusive; first match wins
export const BAND_TABLE: readonly BandTableEntry[] = [
    { name: '160M', lowerMhz: 1.8, upperMhz: 2.0 },
    { name: '80M', lowerMhz: 3.5, upperMhz: 4.0 },
    { name: '60M', lowerMhz: 5.33, upperMhz: 5.4 },
    { name: '40M', lowerMhz: 7.0, upperMhz: 7.3 },
    { name: '30M', lowerMhz: 10.1, upperMhz: 10.15 },
    { name: '20M', lowerMhz: 14.0, upperMhz: 14.35 },
    { name: '17M', lowerMhz: 18.068, upperMhz: 18.168 },
    { name: '15M', lowerMhz: 21.0, upperMhz: 21.45 },
    { name: '12M', lowerMhz: 24.89, upperMhz: 24.99 },
    { name: '10M', lowerMhz: 28.0, upperMhz: 29.7 },
    { name: '6M', lowerMhz: 50.0, upperMhz: 54.0 },
    { name: '2M', lowerMhz: 144.0, upperMhz: 148.0 },
    { name: '1.25M', lowerMhz: 222.0, upperMhz: 225.0 },
    { name: '70CM', lowerMhz: 420.0, upperMhz: 450.0 },
    { name: '33CM', lowerMhz: 902.0, upperMhz: 928.0 },
    { name: '23CM', lowerMhz: 1240.0, upperMhz: 1300.0 },
];

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Strict decimal parse; returns null for anything that is not entirely a number
 */
export function parseDecimal(value: string): number | null {
    if (!DECIMAL_PATTERN.test(value)) return null;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Frequency (MHz string) to band name, '' when unparseable or out of band
 */
export function frequencyToBand(freqMhz: string, table: readonly BandTableEntry[] = BAND_TABLE): string {
    const freq = parseDecimal(freqMhz);
    if (freq === null) return '';

    for (const band of table) {
        if (freq >= band.lowerMhz && freq <= band.upperMhz) {
            return band.name;
        }
    }
    return '';
}

/**
 * Normalize a free-form power string to watts.
 * "1.5kw" -> "1500", "500mw" -> "0.500", "100 W" -> "100".
 * Input without a leading number is returned unchanged.
 */
export function normalizePower(power: string): string {
    if (power === '') return power;

    const lowered = power.trim().toLowerCase();
    const match = lowered.match(/^(\d+(?:\.\d+)?)/);
    if (!match) return power;

    let watts = Number(match[1]);
    if (lowered.includes('kw')) {
        watts *= 1000;
    } else if (lowered.includes('mw')) {
        watts *= 0.001;
    }

    // toFixed switches to exponent notation from 1e21 on
    return Number.isInteger(watts) ? BigInt(watts).toString() : watts.toFixed(3);
}

export function normalizeContact(record: ContactRecord): ContactRecord {
    const normalized: ContactRecord = { ...record };

    if (normalized.POWER !== undefined) {
        normalized.POWER = normalizePower(normalized.POWER);
    }
    if (normalized.FREQ) {
        normalized.BAND = frequencyToBand(normalized.FREQ);
    }

    return normalized;
}
