import {createSocket, Socket} from 'node:dgram';

import {decodeSentence} from './nmea/sentence';
import {extractObservations} from './nmea/extract';
import {SmoothingStore} from './smoothing';
import {Broadcaster} from './broadcaster';
import {Log, silentLog} from './log';
import {Statistics, createStatistics} from './statistics';
import {Seconds, defaultNow} from './types';

export interface IngestOptions {
    log?: Log;
    statistics?: Statistics;
    getNow?: () => Seconds;
}

//
// The only path from a UDP datagram to the smoothed state. Each datagram
// is handled to completion before the next one is read so updates for a
// metric are applied in the order they arrived
export class IngestLoop {
    private socket: Socket | null = null;
    private readonly log: Log;
    private readonly statistics: Statistics;
    private readonly getNow: () => Seconds;

    constructor(
        private readonly store: SmoothingStore,
        private readonly broadcaster: Broadcaster,
        options: IngestOptions = {}
    ) {
        this.log = options.log ?? silentLog;
        this.statistics = options.statistics ?? createStatistics();
        this.getNow = options.getNow ?? defaultNow;
    }

    // Returns how many metrics were updated
    processDatagram(payload: Buffer | string, observedAt: Seconds = this.getNow()): number {
        this.statistics.datagrams++;

        const result = decodeSentence(payload);
        if (!result.ok) {
            this.statistics.decodeFailures++;
            this.log.debug(`ignoring ${result.reason} input (${result.message}): ${JSON.stringify(result.input)}`);
            return 0;
        }

        const observations = extractObservations(result.sentence, observedAt);
        for (const {key, value, observedAt: t} of observations) {
            const {value: smoothed} = this.store.update(key, value, t);
            this.broadcaster.publish(key, smoothed);
        }
        this.statistics.observations += observations.length;
        return observations.length;
    }

    start(port: number, host: string = '0.0.0.0'): Promise<void> {
        if (this.socket) {
            throw new Error('ingest already started');
        }

        const socket = createSocket({type: 'udp4', reuseAddr: true});
        this.socket = socket;

        socket.on('message', (msg, rinfo) => {
            this.log.debug(`UDP recv ${JSON.stringify(msg.toString())} from ${rinfo.address}:${rinfo.port}`);
            this.processDatagram(msg);
        });

        return new Promise<void>((resolve, reject) => {
            // Only fatal if we can't bind, after that just log
            socket.once('error', reject);
            socket.bind(port, host, () => {
                socket.off('error', reject);
                socket.on('error', (e) => this.log.error('UDP socket error', e));
                this.log.info(`listening for NMEA on udp ${host}:${port}`);
                resolve();
            });
        });
    }

    stop(): Promise<void> {
        const socket = this.socket;
        this.socket = null;
        if (!socket) {
            return Promise.resolve();
        }
        return new Promise<void>((resolve) => socket.close(() => resolve()));
    }
}
