/**
 * WavelogClient - submits ADIF records to the Wavelog QSO API
 *
 * POST <url>/api/qso with { key, station_profile_id, type: 'adif', string }.
 * One attempt per record; failures surface as TransportError.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import type { ContactRecord } from '../adif';
import { ADIF_HEADER, adifField } from '../adif/AdifWriter';
import { TransportError, errorMessage } from '../errors';
import type { ContactTransport } from '../pipeline';
import type { Logger } from '../utils/logger';

export const USER_AGENT = 'WL-Transport-v1.0';

export const WavelogResponseSchema = z.object({
    status: z.string(),
    messages: z.array(z.string()).optional(),
});
export type WavelogResponse = z.infer<typeof WavelogResponseSchema>;

export interface WavelogPayload {
    key: string;
    station_profile_id: string;
    type: 'adif';
    string: string;
}

export interface WavelogClientConfig {
    url: string;
    apiKey: string;
    stationProfileId: string;
    timeout: number;            // ms
    logger: Logger;
    verbose?: boolean;
}

// TEST_CALL instead of CALL keeps the probe out of the logbook
const TEST_ADIF = ADIF_HEADER + [
    adifField('TEST_CALL', 'K0TEST'),
    adifField('QSO_DATE', '20240101'),
    adifField('TIME_ON', '120000'),
    adifField('MODE', 'FT8'),
    adifField('FREQ', '14.074'),
    adifField('BAND', '20M'),
    '<EOR>',
].join('');

export class WavelogClient implements ContactTransport {
    private http: AxiosInstance;
    private config: WavelogClientConfig;
    private apiUrl: string;

    constructor(config: WavelogClientConfig) {
        this.config = config;
        this.apiUrl = `${config.url.replace(/\/+$/, '')}/api/qso`;
        this.http = axios.create({
            timeout: config.timeout,
            headers: { 'Content-Type': 'application/json' },
            // Status codes are interpreted by the caller
            validateStatus: () => true,
        });
    }

    public getApiUrl(): string {
        return this.apiUrl;
    }

    public buildPayload(adif: string): WavelogPayload {
        return {
            key: this.config.apiKey,
            station_profile_id: this.config.stationProfileId,
            type: 'adif',
            string: adif,
        };
    }

    public async submit(adif: string, record: ContactRecord): Promise<void> {
        const payload = this.buildPayload(adif);

        if (this.config.verbose) {
            this.config.logger.log(`Sending QSO to Wavelog: ${record.CALL ?? ''} on ${record.FREQ ?? ''}`);
            this.config.logger.log(`API URL: ${this.apiUrl}`);
            this.config.logger.log(`Payload: ${JSON.stringify(payload)}`);
        }

        const response = await this.post(payload, USER_AGENT);

        if (response.status < 200 || response.status > 299) {
            throw new TransportError(`API returned status code: ${response.status}`, response.status);
        }

        const body = this.decode(response);
        if (body.status !== 'created') {
            const details = (body.messages ?? []).join(', ');
            throw new TransportError(`QSO not added (status: ${body.status}): ${details}`, response.status);
        }

        this.config.logger.log(`✓ QSO successfully added: ${record.CALL ?? ''} on ${record.FREQ ?? ''} MHz`);
    }

    /**
     * Post a fixed test record and require a 2xx answer
     */
    public async testConnection(): Promise<void> {
        this.config.logger.log(`Testing Wavelog connection to: ${this.apiUrl}`);

        const response = await this.post(this.buildPayload(TEST_ADIF), `${USER_AGENT}-Test`);
        // A 200 HTML page (login screen, wrong URL) must not pass as a working API
        const { status } = this.decode(response);

        this.config.logger.log(`Wavelog connection test - Status: ${response.status}, Response: ${status}`);

        if (response.status >= 200 && response.status <= 299) {
            this.config.logger.log('✓ Wavelog connection successful');
            return;
        }

        throw new TransportError(`Wavelog connection failed: HTTP ${response.status} - ${status}`, response.status);
    }

    private async post(payload: WavelogPayload, userAgent: string): Promise<AxiosResponse<unknown>> {
        try {
            return await this.http.post<unknown>(this.apiUrl, payload, {
                headers: { 'User-Agent': userAgent },
            });
        } catch (error) {
            throw new TransportError(`HTTP request failed: ${errorMessage(error)}`);
        }
    }

    private decode(response: AxiosResponse<unknown>): WavelogResponse {
        const parsed = WavelogResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new TransportError(`failed to decode response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`, response.status);
        }
        return parsed.data;
    }
}
