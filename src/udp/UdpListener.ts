/**
 * UdpListener - receives contact datagrams from the logging program
 *
 * - Binds a single udp4 socket (default port 2333)
 * - Decodes each datagram as UTF-8 and hands it to the pipeline
 * - Socket errors are logged, and re-emitted as 'error' when someone listens
 */

import dgram from 'dgram';
import { EventEmitter } from 'events';
import type { Logger } from '../utils/logger';

export interface PayloadSink {
    enqueue(payload: string): void;
}

export interface UdpListenerConfig {
    port: number;
    host?: string;              // Bind address (default: all interfaces)
    logger: Logger;
    verbose?: boolean;
}

export class UdpListener extends EventEmitter {
    private config: UdpListenerConfig;
    private sink: PayloadSink;
    private socket: dgram.Socket | null = null;

    constructor(config: UdpListenerConfig, sink: PayloadSink) {
        super();
        this.config = config;
        this.sink = sink;
    }

    public start(): Promise<void> {
        if (this.socket) {
            this.config.logger.log('UDP listener already running');
            return Promise.resolve();
        }

        const socket = dgram.createSocket('udp4');
        this.socket = socket;

        socket.on('message', (msg, rinfo) => {
            this.handleDatagram(msg, `${rinfo.address}:${rinfo.port}`);
        });

        return new Promise((resolve, reject) => {
            const onBindError = (err: Error) => {
                this.socket = null;
                socket.close();
                reject(new Error(`failed to bind to UDP port ${this.config.port}: ${err.message}`));
            };
            socket.once('error', onBindError);

            socket.bind(this.config.port, this.config.host, () => {
                socket.off('error', onBindError);
                socket.on('error', (err) => {
                    this.config.logger.error('Error reading from UDP:', err.message);
                    // Unhandled 'error' events would crash the process
                    if (this.listenerCount('error') > 0) this.emit('error', err);
                });
                this.config.logger.log(`UDP server listening on port ${this.getPort()}`);
                resolve();
            });
        });
    }

    public stop(): Promise<void> {
        const socket = this.socket;
        this.socket = null;
        if (!socket) return Promise.resolve();

        return new Promise(resolve => {
            socket.close(() => {
                this.config.logger.log('UDP listener stopped');
                resolve();
            });
        });
    }

    /**
     * Bound port; differs from the configured one when binding to port 0
     */
    public getPort(): number {
        return this.socket ? this.socket.address().port : this.config.port;
    }

    private handleDatagram(msg: Buffer, from: string): void {
        const message = msg.toString('utf8');
        this.config.logger.log(`Received ${msg.length} bytes from ${from}`);

        if (this.config.verbose) {
            this.config.logger.log(`Message content: ${message}`);
        }

        this.emit('datagram', message, from);
        this.sink.enqueue(message);
    }
}
