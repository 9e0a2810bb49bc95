/**
 * ADIF module - parsers, normalization and serialization for contact records
 */

export { CONTACT_FIELDS } from './types';
export type {
    ContactField,
    ContactRecord,
    PayloadFormat,
    ParseContext,
    BandTableEntry,
} from './types';
export { parseAdifRecord } from './AdifParser';
export { parseXmlContact, parseContactTimestamp, extractContactDocument } from './XmlContactParser';
export { generateAdif, adifField, ADIF_HEADER, ADIF_EOR } from './AdifWriter';
export {
    BAND_TABLE,
    frequencyToBand,
    normalizePower,
    normalizeContact,
    parseDecimal,
} from './normalize';
