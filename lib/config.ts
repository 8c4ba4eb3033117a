import * as dotenv from 'dotenv';
import yargs from 'yargs';
import {difference as _difference, uniq as _uniq, flatMap as _flatMap} from 'lodash';

import {MetricKey, metricKeys, isMetricKey} from './metrics';
import {LogLevel, isLogLevel, logLevels} from './log';
import {Seconds} from './types';

export interface Config {
    udpPort: number;
    webPort: number;
    logLevel: LogLevel;
    displayKeys: MetricKey[];
    tau: Seconds;
    sendTimeoutMs: number;
    maxPendingBytes: number;
}

// Refuse to start, lists everything that is wrong not just the first
export class ConfigurationError extends Error {
    constructor(readonly problems: string[]) {
        super(`invalid configuration: ${problems.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

// Load the local settings file if there is one, it just populates process.env
export function loadEnvironment(path: string = '.env.local'): boolean {
    return !dotenv.config({path}).error;
}

//
// Command line wins, then NMEA_* environment variables, then the defaults
export function parseArguments(argv: string[]) {
    return yargs(argv)
        .scriptName('nmea-relay')
        .usage('$0 [options]\n\nSmooth NMEA instrument data from UDP and push it to web clients')
        .env('NMEA')
        .option('udp-port', {type: 'number', default: 2002, description: 'UDP port to listen for NMEA sentences'})
        .option('web-port', {type: 'number', default: 8000, description: 'HTTP/WebSocket server port'})
        .option('log-level', {type: 'string', default: 'error', description: `Logging level (${logLevels.join(', ')})`})
        .option('display-data', {type: 'string', array: true, default: ['BSP', 'TWA', 'HDG'], description: `Which keys to display (${metricKeys.join(' ')})`})
        .option('tau', {alias: 'smoothing-tau', type: 'number', default: 2, description: 'Smoothing time constant in seconds, 0 disables smoothing'})
        .option('send-timeout', {alias: 'send-timeout-ms', type: 'number', default: 2000, description: 'Drop a client if a send takes longer than this (ms)'})
        .option('max-pending', {alias: 'max-pending-bytes', type: 'number', default: 65536, description: 'Drop a client with more than this many bytes queued'})
        .strict()
        .fail((msg, err) => {
            throw new ConfigurationError([err?.message ?? msg]);
        })
        .help()
        .parseSync();
}

function isPort(port: number): boolean {
    return Number.isInteger(port) && port > 0 && port < 65536;
}

//
// Check everything once at startup, after this the configuration
// never changes
export function validateConfig(args: ReturnType<typeof parseArguments>): Config {
    const problems: string[] = [];

    // Accept --display-data BSP TWA, --display-data BSP,TWA or NMEA_DISPLAY_DATA="BSP TWA"
    const requested = _uniq(_flatMap(args.displayData, (d) => d.split(/[\s,]+/)).filter((d) => d !== ''));
    const unknown = _difference(requested, metricKeys);
    if (unknown.length) {
        problems.push(`unknown display key(s) ${unknown.join(', ')}, valid keys are ${metricKeys.join(' ')}`);
    }
    if (!requested.length) {
        problems.push('no display keys configured');
    }

    const logLevel = args.logLevel.toLowerCase();
    if (!isLogLevel(logLevel)) {
        problems.push(`unknown log level ${args.logLevel}`);
    }

    if (!isPort(args.udpPort)) {
        problems.push(`invalid udp port ${args.udpPort}`);
    }
    if (!isPort(args.webPort)) {
        problems.push(`invalid web port ${args.webPort}`);
    }
    if (!Number.isFinite(args.tau) || args.tau < 0) {
        problems.push(`smoothing time constant must be >= 0, not ${args.tau}`);
    }
    if (!(args.sendTimeout > 0)) {
        problems.push(`send timeout must be > 0, not ${args.sendTimeout}`);
    }
    if (!(args.maxPending > 0)) {
        problems.push(`max pending bytes must be > 0, not ${args.maxPending}`);
    }

    if (problems.length || !isLogLevel(logLevel)) {
        throw new ConfigurationError(problems);
    }

    return {
        udpPort: args.udpPort,
        webPort: args.webPort,
        logLevel,
        displayKeys: requested.filter(isMetricKey),
        tau: args.tau as Seconds,
        sendTimeoutMs: args.sendTimeout,
        maxPendingBytes: args.maxPending
    };
}

export function loadConfig(argv: string[]): Config {
    return validateConfig(parseArguments(argv));
}
