import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileLogger, MemoryLogger, formatArgs } from '../src/utils/logger';

describe('formatArgs', () => {
    it('joins strings, pretty-prints objects and unwraps errors', () => {
        assert.equal(formatArgs(['a', 1, { b: 2 }]), 'a 1 {\n  "b": 2\n}');
        assert.equal(formatArgs(['failed:', new Error('boom')]), 'failed: boom');
    });
});

describe('FileLogger', () => {
    let dir: string;

    before(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wavelog-transport-log-'));
    });

    after(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('appends prefixed, timestamped lines', async () => {
        const file = path.join(dir, 'transport.log');
        const logger = new FileLogger({ filePath: file, console: false });

        logger.log('Received 13 bytes');
        logger.warn('slow response');
        logger.error('Failed:', new Error('boom'));
        logger.debug('hidden');
        await logger.close();

        const lines = fs.readFileSync(file, 'utf-8').trimEnd().split('\n');
        assert.equal(lines.length, 3);
        assert.match(lines[0], /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] WL-TRANSPORT: Received 13 bytes$/);
        assert.match(lines[1], /\] WL-TRANSPORT: WARN: slow response$/);
        assert.match(lines[2], /\] WL-TRANSPORT: ERROR: Failed: boom$/);
        assert.equal(logger.getFilePath(), file);
    });

    it('writes debug lines when verbose', async () => {
        const file = path.join(dir, 'verbose.log');
        const logger = new FileLogger({ filePath: file, console: false, verbose: true, prefix: 'TEST:' });

        logger.debug('Processing QSO 1 of 2');
        await logger.close();

        assert.match(fs.readFileSync(file, 'utf-8'), /\] TEST: Processing QSO 1 of 2\n$/);
    });
});

describe('MemoryLogger', () => {
    it('records lines and drops debug output when quiet', () => {
        const logger = new MemoryLogger(false);
        logger.log('one');
        logger.debug('two');
        logger.error('three');
        assert.deepEqual(logger.lines, ['one', 'ERROR: three']);
    });
});
