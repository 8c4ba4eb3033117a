import {IncomingMessage} from 'node:http';
import {WebSocket} from 'ws';

import {Broadcaster, Subscriber} from './broadcaster';
import {Log} from './log';

let connectionCount = 0;

// The parts of a ws WebSocket we push through
export interface PushSocket {
    readonly readyState: number;
    readonly bufferedAmount: number;
    send(data: string, cb: (err?: Error) => void): void;
    ping(): void;
    terminate(): void;
    on(event: 'pong', listener: () => void): unknown;
}

//
// A browser connected to /ws. We never expect anything from them
// other than pongs
export class WebSocketSubscriber implements Subscriber {
    // cleared when we ping, set again on pong
    isAlive = true;

    constructor(
        readonly id: string,
        private readonly ws: PushSocket
    ) {
        ws.on('pong', () => {
            this.isAlive = true;
        });
    }

    get pendingBytes(): number {
        return this.ws.bufferedAmount;
    }

    send(unit: string): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (this.ws.readyState !== WebSocket.OPEN) {
                reject(new Error(`socket is not open (${this.ws.readyState})`));
                return;
            }
            this.ws.send(unit, (err) => (err ? reject(err) : resolve()));
        });
    }

    // false if it never answered the previous ping
    ping(): boolean {
        if (!this.isAlive) {
            return false;
        }
        this.isAlive = false;
        this.ws.ping();
        return true;
    }

    close(): void {
        this.ws.terminate();
    }
}

//
// Hook a new connection up to the broadcaster, it gets the current
// state straight away
export function attachWebSocket(ws: WebSocket, req: IncomingMessage, broadcaster: Broadcaster, log: Log): WebSocketSubscriber {
    const forwarded = req.headers['x-forwarded-for'];
    const peer = (Array.isArray(forwarded) ? forwarded[0] : forwarded) || req.socket.remoteAddress || 'unknown';
    const subscriber = new WebSocketSubscriber(`${peer}#${++connectionCount}`, ws);

    ws.on('close', () => broadcaster.leave(subscriber));
    ws.on('error', (e) => broadcaster.leave(subscriber, `socket error ${e.message}`));
    ws.on('message', (m) => log.debug(`ignoring message from ${subscriber.id}: ${String(m)}`));

    broadcaster.join(subscriber);
    return subscriber;
}

//
// Drop anybody who didn't answer the last ping, and ping everybody else
export function sweepWebSocketSubscribers(broadcaster: Broadcaster): void {
    for (const subscriber of broadcaster.subscribers()) {
        if (subscriber instanceof WebSocketSubscriber && !subscriber.ping()) {
            broadcaster.leave(subscriber, 'no response to ping');
        }
    }
}
