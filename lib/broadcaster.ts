import {MetricKey, metricKeys, formatUnit} from './metrics';
import {SmoothingStore} from './smoothing';
import {Log, silentLog} from './log';
import {Statistics, createStatistics} from './statistics';

//
// Anything we can push updates to, the websocket connection in
// production and plain objects in the tests
export interface Subscriber {
    readonly id: string;

    // Resolves once the unit has been handed to the transport
    send(unit: string): Promise<void>;

    // Bytes queued but not yet written
    readonly pendingBytes: number;

    // Release the transport, may be called more than once
    close(): void;
}

export interface BroadcasterOptions {
    displayKeys?: readonly MetricKey[]; // default is everything
    sendTimeoutMs: number;
    maxPendingBytes: number;
    log?: Log;
    statistics?: Statistics;
}

export class SendTimeout extends Error {
    constructor(readonly timeoutMs: number) {
        super(`send did not complete in ${timeoutMs}ms`);
    }
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => reject(new SendTimeout(timeoutMs)), timeoutMs);
        promise.then(
            (v) => {
                clearTimeout(timer);
                resolve(v);
            },
            (e) => {
                clearTimeout(timer);
                reject(e);
            }
        );
    });
}

//
// Tracks who is listening and pushes "<key>:<value>" units to them. A
// subscriber that errors, takes too long or falls too far behind is
// dropped, it is expected to reconnect and will get a fresh replay.
//
// Nothing in here waits on a subscriber so ingest can't be held up by
// a slow client
export class Broadcaster {
    private readonly members = new Set<Subscriber>();
    private readonly displayed: ReadonlySet<MetricKey>;
    private readonly log: Log;
    private readonly statistics: Statistics;

    constructor(
        private readonly store: SmoothingStore,
        private readonly options: BroadcasterOptions
    ) {
        this.displayed = new Set(options.displayKeys ?? metricKeys);
        this.log = options.log ?? silentLog;
        this.statistics = options.statistics ?? createStatistics();
    }

    get size(): number {
        return this.members.size;
    }

    has(subscriber: Subscriber): boolean {
        return this.members.has(subscriber);
    }

    // Copy, so it is safe to leave() while iterating
    subscribers(): Subscriber[] {
        return Array.from(this.members);
    }

    // Add and send everything we currently know
    join(subscriber: Subscriber): void {
        if (this.members.has(subscriber)) {
            return;
        }
        this.members.add(subscriber);
        this.log.info(`subscriber ${subscriber.id} joined, ${this.members.size} connected`);

        for (const [key, value] of this.store.entries()) {
            if (this.displayed.has(key)) {
                this.deliver(subscriber, formatUnit(key, value));
            }
        }
    }

    // reason is set when we are dropping it rather than it going away
    leave(subscriber: Subscriber, reason?: string): void {
        if (!this.members.delete(subscriber)) {
            return;
        }
        subscriber.close();

        if (reason) {
            this.statistics.subscribersDropped++;
            this.log.info(`dropping subscriber ${subscriber.id}: ${reason}`);
        } else {
            this.log.info(`subscriber ${subscriber.id} left, ${this.members.size} connected`);
        }
    }

    publish(key: MetricKey, value: number): void {
        if (!this.displayed.has(key)) {
            return;
        }
        const unit = formatUnit(key, value);

        // leave() can be called while we are iterating
        for (const subscriber of Array.from(this.members)) {
            this.deliver(subscriber, unit);
        }
    }

    private deliver(subscriber: Subscriber, unit: string): void {
        if (subscriber.pendingBytes > this.options.maxPendingBytes) {
            this.leave(subscriber, `${subscriber.pendingBytes} bytes waiting to send`);
            return;
        }
        void this.send(subscriber, unit);
    }

    private async send(subscriber: Subscriber, unit: string): Promise<void> {
        try {
            await withTimeout(subscriber.send(unit), this.options.sendTimeoutMs);
            this.statistics.unitsPublished++;
        } catch (e) {
            this.leave(subscriber, e instanceof Error ? e.message : String(e));
        }
    }
}
