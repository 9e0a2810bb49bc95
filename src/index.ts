#!/usr/bin/env node
import { Config, loadConfig } from './config';
import { APP_NAME, APP_VERSION, parseArgs, usage } from './cli';
import { errorMessage } from './errors';
import { RecordPipeline } from './pipeline';
import { UdpListener } from './udp/UdpListener';
import { FileLogger } from './utils/logger';
import { WavelogClient } from './wavelog';

async function main() {
    const options = parseArgs(process.argv.slice(2));
    if (options.help) {
        console.log(usage());
        return;
    }

    let config: Config;
    try {
        config = loadConfig(options.configFile);
    } catch (error) {
        const bootLogger = new FileLogger();
        bootLogger.error('Failed to load configuration:', errorMessage(error));
        await bootLogger.close();
        process.exit(1);
    }

    const logger = new FileLogger({
        filePath: config.log.file,
        verbose: config.server.verbose,
    });

    const client = new WavelogClient({
        ...config.wavelog,
        logger,
        verbose: config.server.verbose,
    });

    if (options.test) {
        logger.log('Running in test mode');
        try {
            await client.testConnection();
            logger.log('Wavelog connection test passed');
        } catch (error) {
            logger.error('Wavelog connection test failed:', errorMessage(error));
            process.exitCode = 1;
        }
        await logger.close();
        return;
    }

    const pipeline = new RecordPipeline({
        transport: client,
        logger,
        verbose: config.server.verbose,
        maxConcurrent: config.server.maxConcurrent,
    });

    const listener = new UdpListener({
        port: config.server.port,
        logger,
        verbose: config.server.verbose,
    }, pipeline);

    logger.log(`Starting ${APP_NAME} v${APP_VERSION} on port ${config.server.port}`);
    await listener.start();

    const shutdown = async () => {
        logger.log('Shutting down...');
        await listener.stop();
        await pipeline.drain();
        await logger.close();
        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((error: unknown) => {
            console.error('Shutdown failed:', errorMessage(error));
            process.exit(1);
        });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
    console.error('Failed to start server:', errorMessage(error));
    process.exit(1);
});
