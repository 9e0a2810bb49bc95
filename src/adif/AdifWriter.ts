import type { ContactField, ContactRecord } from './types';

export const ADIF_HEADER = '<ADIF_VER:5>5.0<EOH>\n';
export const ADIF_EOR = '<EOR>';

// Output order; [ADIF tag, record field]
const ADIF_OUTPUT_FIELDS: ReadonlyArray<readonly [string, ContactField]> = [
    ['CALL', 'CALL'],
    ['QSO_DATE', 'QSO_DATE'],
    ['TIME_ON', 'TIME_ON'],
    ['MODE', 'MODE'],
    ['RST_RCVD', 'RST_RCVD'],
    ['RST_SENT', 'RST_SENT'],
    ['FREQ', 'FREQ'],
    ['FREQ_RX', 'FREQ_RX'],
    ['BAND', 'BAND'],
    ['TX_PWR', 'POWER'],
    ['OPERATOR', 'OPERATOR'],
    ['MY_CALL', 'MYCALL'],
    ['STATION_CALLSIGN', 'STATION_CALLSIGN'],
    ['GRIDSQUARE', 'GRIDSQUARE'],
    ['COMMENT', 'COMMENT'],
    ['STX', 'STX'],
    ['SRX', 'SRX'],
    ['STX_STRING', 'STX_STRING'],
    ['SRX_STRING', 'SRX_STRING'],
    ['RTX', 'RTX'],
    // Contest fields
    ['CONTEST_ID', 'CONTEST_ID'],
    ['PREFIX', 'PREFIX'],
    ['MY_GRIDSQUARE', 'MY_GRIDSQUARE'],
    ['NAME', 'NAME'],
    ['QTH', 'QTH'],
    ['STATE', 'STATE'],
    ['COUNTRY', 'COUNTRY'],
    ['CQZ', 'CQZ'],
    ['ITUZ', 'ITUZ'],
    ['CONT', 'CONT'],
    ['IOTA', 'IOTA'],
    ['DXCC', 'DXCC'],
    ['PROP_MODE', 'PROP_MODE'],
    ['SAT_NAME', 'SAT_NAME'],
    ['SAT_MODE', 'SAT_MODE'],
    ['SUBMODE', 'SUBMODE'],
    ['QSLMSG', 'QSLMSG'],
    ['NOTES', 'NOTES'],
    ['EMAIL', 'EMAIL'],
    ['DARC_DOK', 'DARC_DOK'],
    ['SOTA_REF', 'SOTA_REF'],
    ['WWFF_REF', 'WWFF_REF'],
    ['POTA_REF', 'POTA_REF'],
    ['CNTY', 'CNTY'],
    ['REGION', 'REGION'],
    ['LAT', 'LAT'],
    ['LON', 'LON'],
    ['ANT_AZ', 'ANT_AZ'],
    ['ANT_EL', 'ANT_EL'],
    ['ANT_PATH', 'ANT_PATH'],
    ['A_INDEX', 'A_INDEX'],
    ['K_INDEX', 'K_INDEX'],
    ['SFI', 'SFI'],
    ['RX_PWR', 'RX_PWR'],
];

/**
 * `<NAME:len>value` where len is the UTF-8 byte length of value
 */
export function adifField(name: string, value: string): string {
    return `<${name}:${Buffer.byteLength(value, 'utf8')}>${value}`;
}

/**
 * Render a record as a single-QSO ADIF document. Empty fields are omitted;
 * QSO_DATE_OFF and TIME_OFF are not part of the output.
 */
export function generateAdif(record: ContactRecord): string {
    const parts: string[] = [ADIF_HEADER];

    for (const [tag, field] of ADIF_OUTPUT_FIELDS) {
        const value = record[field];
        if (value) {
            parts.push(`${adifField(tag, value)} `);
        }
    }

    parts.push(`${ADIF_EOR}\n`);
    return parts.join('');
}
