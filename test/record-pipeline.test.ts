import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';
import type { ContactRecord } from '../src/adif';
import { TransportError } from '../src/errors';
import { RecordPipeline, type ContactTransport, type QsoFailure } from '../src/pipeline';
import { MemoryLogger } from '../src/utils/logger';

class FakeTransport implements ContactTransport {
    public submitted: Array<{ adif: string; record: ContactRecord }> = [];
    public rejectCalls = new Set<string>();
    public delayMs = 0;
    public inFlight = 0;
    public maxInFlight = 0;

    async submit(adif: string, record: ContactRecord): Promise<void> {
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            if (this.delayMs > 0) await delay(this.delayMs);
            if (record.CALL !== undefined && this.rejectCalls.has(record.CALL)) {
                throw new TransportError('API returned status code: 500', 500);
            }
            this.submitted.push({ adif, record });
        } finally {
            this.inFlight--;
        }
    }
}

function createPipeline(maxConcurrent = 4) {
    const transport = new FakeTransport();
    const logger = new MemoryLogger();
    const pipeline = new RecordPipeline({ transport, logger, maxConcurrent });
    return { transport, logger, pipeline };
}

const XML_PAYLOAD = [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<contactinfo>',
    '<timestamp>2024-03-15T10:15:30</timestamp>',
    '<call>DL1ABC</call>',
    '<mode>USB</mode>',
    '<txfreq>1420000</txfreq>',
    '<rxfreq>1420000</rxfreq>',
    '<power>1.5kW</power>',
    '</contactinfo>',
].join('');

describe('RecordPipeline.processMessage', () => {
    it('submits every record of a batch in order', async () => {
        const { transport, logger, pipeline } = createPipeline();

        const result = await pipeline.processMessage('<CALL:5>K1ABC<EOR><CALL:5>K2DEF<EOR>');

        assert.deepEqual(result, { format: 'adif', total: 2, succeeded: 2, failed: 0 });
        assert.deepEqual(transport.submitted.map(s => s.record.CALL), ['K1ABC', 'K2DEF']);
        assert.ok(logger.lines.includes('Successfully processed 2 QSOs from batch payload'));
    });

    it('skips a bad record and continues with the rest', async () => {
        const { transport, logger, pipeline } = createPipeline();

        const result = await pipeline.processMessage('<CALL:5>K1ABC<EOR><MODE:3>FT8<EOR><CALL:5>K2DEF<EOR>');

        assert.deepEqual(result, { format: 'adif', total: 3, succeeded: 2, failed: 1 });
        assert.deepEqual(transport.submitted.map(s => s.record.CALL), ['K1ABC', 'K2DEF']);
        assert.ok(logger.lines.includes('Failed to parse message: missing required CALL field in ADIF'));
    });

    it('reports transport failures per record', async () => {
        const { transport, logger, pipeline } = createPipeline();
        transport.rejectCalls.add('K1ABC');
        const failures: QsoFailure[] = [];
        pipeline.on('qso-failed', (failure: QsoFailure) => failures.push(failure));

        const result = await pipeline.processMessage('<CALL:5>K1ABC<EOR><CALL:5>K2DEF<EOR>');

        assert.deepEqual(result, { format: 'adif', total: 2, succeeded: 1, failed: 1 });
        assert.ok(logger.lines.includes('Failed to send QSO to Wavelog: API returned status code: 500'));
        assert.deepEqual(failures, [{
            stage: 'submit',
            format: 'adif',
            message: 'Failed to send QSO to Wavelog: API returned status code: 500',
        }]);
        assert.ok(!logger.lines.some(line => line.startsWith('Successfully processed')));
    });

    it('normalizes and serializes an XML contact', async () => {
        const { transport, pipeline } = createPipeline();

        const result = await pipeline.processMessage(XML_PAYLOAD);

        assert.deepEqual(result, { format: 'xml', total: 1, succeeded: 1, failed: 0 });
        const [{ record, adif }] = transport.submitted;
        assert.equal(record.MODE, 'SSB');
        assert.equal(record.BAND, '20M');
        assert.equal(record.POWER, '1500');
        assert.equal(
            adif,
            '<ADIF_VER:5>5.0<EOH>\n' +
                '<CALL:6>DL1ABC <QSO_DATE:8>20240315 <TIME_ON:6>101530 <MODE:3>SSB ' +
                '<FREQ:9>14.200000 <FREQ_RX:9>14.200000 <BAND:3>20M <TX_PWR:4>1500 <EOR>\n',
        );
    });

    it('leaves ADIF mode unconverted', async () => {
        const { transport, pipeline } = createPipeline();

        await pipeline.processMessage('<CALL:5>K1ABC<MODE:3>USB<FREQ:6>14.250');

        assert.equal(transport.submitted[0].record.MODE, 'USB');
        assert.equal(transport.submitted[0].record.BAND, '20M');
    });

    it('emits qso-submitted with the record and ADIF', async () => {
        const { pipeline } = createPipeline();
        const calls: string[] = [];
        pipeline.on('qso-submitted', (record: ContactRecord, adif: string) => {
            calls.push(`${record.CALL}|${adif.endsWith('<EOR>\n')}`);
        });

        await pipeline.processMessage('<CALL:5>K1ABC<TX_PWR:5>500mW');

        assert.deepEqual(calls, ['K1ABC|true']);
    });
});

describe('RecordPipeline.processSingle', () => {
    it('returns a failed result instead of throwing', async () => {
        const { pipeline } = createPipeline();

        const result = await pipeline.processSingle('<contactinfo>', 'xml');

        assert.equal(result.success, false);
        assert.match(result.message, /^Failed to parse message: XML parsing failed/);
    });

    it('returns the call on success', async () => {
        const { pipeline } = createPipeline();

        const result = await pipeline.processSingle('<CALL:5>K1ABC', 'adif');

        assert.deepEqual(result, { success: true, call: 'K1ABC', message: 'Submitted K1ABC' });
    });
});

describe('RecordPipeline.enqueue', () => {
    it('bounds the number of payloads in flight', async () => {
        const { transport, pipeline } = createPipeline(2);
        transport.delayMs = 10;

        for (const call of ['K1AAA', 'K1BBB', 'K1CCC', 'K1DDD']) {
            pipeline.enqueue(`<CALL:5>${call}`);
        }
        assert.equal(pipeline.getActiveCount(), 2);
        assert.equal(pipeline.getPendingCount(), 2);

        await pipeline.drain();

        assert.equal(transport.maxInFlight, 2);
        assert.equal(transport.submitted.length, 4);
        assert.equal(pipeline.getActiveCount(), 0);
    });

    it('drains immediately when idle', async () => {
        const { pipeline } = createPipeline();
        await pipeline.drain();
        assert.equal(pipeline.getPendingCount(), 0);
    });
});
