/**
 * RecordPipeline - detect -> parse -> normalize -> serialize -> submit
 *
 * - One payload per UDP datagram, handed in through enqueue()
 * - At most `maxConcurrent` payloads in flight; the rest wait in FIFO order
 * - Records of an ADIF batch run sequentially in file order
 * - A failing record is logged and skipped, never aborting the batch
 *
 * Events:
 * - 'qso-submitted' (record, adif)
 * - 'qso-failed' ({ stage, message, format })
 */

import { EventEmitter } from 'events';
import {
    ContactRecord,
    PayloadFormat,
    generateAdif,
    normalizeContact,
    parseAdifRecord,
    parseXmlContact,
} from '../adif';
import { errorMessage } from '../errors';
import type { Logger } from '../utils/logger';
import { detectFormat, splitAdifRecords } from './formatDetector';

export interface ContactTransport {
    submit(adif: string, record: ContactRecord): Promise<void>;
}

export interface RecordPipelineOptions {
    transport: ContactTransport;
    logger: Logger;
    verbose?: boolean;
    maxConcurrent?: number;    // default: 4
}

export type FailureStage = 'parse' | 'submit';

export interface QsoFailure {
    stage: FailureStage;
    message: string;
    format: PayloadFormat;
}

export interface RecordResult {
    success: boolean;
    call?: string;
    message: string;
}

export interface BatchResult {
    format: PayloadFormat;
    total: number;
    succeeded: number;
    failed: number;
}

export class RecordPipeline extends EventEmitter {
    private transport: ContactTransport;
    private logger: Logger;
    private verbose: boolean;
    private maxConcurrent: number;
    private active: number = 0;
    private queue: string[] = [];
    private idleWaiters: Array<() => void> = [];

    constructor(options: RecordPipelineOptions) {
        super();
        this.transport = options.transport;
        this.logger = options.logger;
        this.verbose = options.verbose ?? false;
        this.maxConcurrent = Math.max(1, options.maxConcurrent ?? 4);
    }

    // === Queueing ===

    /**
     * Schedule a datagram payload. Returns immediately.
     */
    public enqueue(payload: string): void {
        this.queue.push(payload);
        this.pump();
    }

    public getPendingCount(): number {
        return this.queue.length;
    }

    public getActiveCount(): number {
        return this.active;
    }

    /**
     * Resolves once nothing is queued or running
     */
    public drain(): Promise<void> {
        if (this.active === 0 && this.queue.length === 0) {
            return Promise.resolve();
        }
        return new Promise(resolve => this.idleWaiters.push(resolve));
    }

    private pump(): void {
        while (this.active < this.maxConcurrent) {
            const payload = this.queue.shift();
            if (payload === undefined) break;

            this.active++;
            this.processMessage(payload)
                .catch(error => this.logger.error('Unexpected pipeline failure:', errorMessage(error)))
                .finally(() => {
                    this.active--;
                    this.pump();
                    this.notifyIdle();
                });
        }
    }

    private notifyIdle(): void {
        if (this.active > 0 || this.queue.length > 0) return;
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach(resolve => resolve());
    }

    // === Processing ===

    public async processMessage(payload: string): Promise<BatchResult> {
        const format = detectFormat(payload);
        const records = format === 'xml' ? [payload] : splitAdifRecords(payload);

        let succeeded = 0;
        for (const [index, record] of records.entries()) {
            if (records.length > 1 && this.verbose) {
                this.logger.debug(`Processing QSO ${index + 1} of ${records.length}`);
            }
            const result = await this.processSingle(record, format);
            if (result.success) succeeded++;
        }

        if (succeeded > 1) {
            this.logger.log(`Successfully processed ${succeeded} QSOs from batch payload`);
        }

        return {
            format,
            total: records.length,
            succeeded,
            failed: records.length - succeeded,
        };
    }

    public async processSingle(message: string, format: PayloadFormat): Promise<RecordResult> {
        const context = { logger: this.logger, verbose: this.verbose };

        let record: ContactRecord;
        try {
            record = format === 'xml'
                ? parseXmlContact(message, context)
                : parseAdifRecord(message, context);
        } catch (error) {
            return this.fail('parse', format, `Failed to parse message: ${errorMessage(error)}`);
        }

        const normalized = normalizeContact(record);
        const adif = generateAdif(normalized);

        try {
            await this.transport.submit(adif, normalized);
        } catch (error) {
            return this.fail('submit', format, `Failed to send QSO to Wavelog: ${errorMessage(error)}`, normalized.CALL);
        }

        this.emit('qso-submitted', normalized, adif);
        return { success: true, call: normalized.CALL, message: `Submitted ${normalized.CALL}` };
    }

    private fail(stage: FailureStage, format: PayloadFormat, message: string, call?: string): RecordResult {
        this.logger.log(message);
        const failure: QsoFailure = { stage, message, format };
        this.emit('qso-failed', failure);
        return { success: false, call, message };
    }
}
