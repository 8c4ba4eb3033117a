#!/usr/bin/env node

// Copyright 2020-2023 (c) Melissa Jenkins
// BSD licence but please if you find bugs send pull request to github

import http from 'node:http';

// And the Websocket
import {WebSocketServer} from 'ws';
import {hideBin} from 'yargs/helpers';

import {Config, ConfigurationError, loadConfig, loadEnvironment} from '../lib/config';
import {createLog} from '../lib/log';
import {initialiseInsights} from '../lib/insights';
import {createStatistics, reportStatistics} from '../lib/statistics';
import {SmoothingStore} from '../lib/smoothing';
import {Broadcaster} from '../lib/broadcaster';
import {IngestLoop} from '../lib/ingest';
import {attachWebSocket, sweepWebSocketSubscribers} from '../lib/wssubscriber';
import {renderPage, routeRequest} from '../lib/page';

// How often we ping clients, anybody who misses one is dropped
const pingInterval = 30 * 1000;

// How often statistics are logged and sent
const statisticsInterval = 60 * 1000;

async function main() {
    // Load the current file if there is one, flags and environment still work without it
    const haveEnvFile = loadEnvironment('.env.local');

    let config: Config;
    try {
        config = loadConfig(hideBin(process.argv));
    } catch (e) {
        if (e instanceof ConfigurationError) {
            console.error(e.message);
            process.exit(1);
        }
        throw e;
    }

    const log = createLog(config.logLevel);
    if (!haveEnvFile) {
        log.debug('no .env.local found, using command line and environment');
    }

    // Allow insights if it's configured.
    initialiseInsights();
    const statistics = createStatistics();

    // One store, written by ingest and read by the broadcaster for replays
    const store = new SmoothingStore(config.tau);
    const broadcaster = new Broadcaster(store, {
        displayKeys: config.displayKeys,
        sendTimeoutMs: config.sendTimeoutMs,
        maxPendingBytes: config.maxPendingBytes,
        log,
        statistics
    });
    const ingest = new IngestLoop(store, broadcaster, {log, statistics});

    const page = renderPage(config.displayKeys);
    const server = http.createServer((req, res) => {
        const route = routeRequest(req.url);

        // health check
        if (route == 'status') {
            res.writeHead(200);
            res.end(http.STATUS_CODES[200]);
            return;
        }

        if (route == 'page') {
            res.setHeader('Content-Type', 'text/html; charset=utf-8');
            res.writeHead(200);
            res.end(page);
            return;
        }
        res.writeHead(404);
        res.end(http.STATUS_CODES[404]);
    });

    // And start our websocket server, clients get the current state as soon as they connect
    const wss = new WebSocketServer({server, path: '/ws'});
    wss.on('connection', (ws, req) => attachWebSocket(ws, req, broadcaster, log));
    wss.on('error', (e) => log.error('websocket server error', e));

    await ingest.start(config.udpPort);
    await new Promise<void>((resolve) => server.listen(config.webPort, resolve));
    log.info(`NMEA relay, tau ${config.tau}s, displaying ${config.displayKeys.join(' ')}, listening on ${config.webPort}`);

    //
    // Housekeeping
    const pingTimer = setInterval(() => {
        sweepWebSocketSubscribers(broadcaster);
        statistics.activeSubscribers += broadcaster.size;
        statistics.subscriberCycles++;
    }, pingInterval);

    const statisticsTimer = setInterval(() => reportStatistics(statistics, log), statisticsInterval);

    const shutdown = (signal: string) => {
        log.info(`${signal} received, closing`);
        clearInterval(pingTimer);
        clearInterval(statisticsTimer);
        wss.clients.forEach((client) => client.terminate());
        wss.close();
        server.close();
        ingest.stop().then(
            () => process.exit(0),
            (e) => {
                log.error('error closing UDP socket', e);
                process.exit(1);
            }
        );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().then(
    () => console.log('Started'),
    (e) => {
        console.error('unable to start', e);
        process.exit(1);
    }
);
