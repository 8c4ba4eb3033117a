import {trackMetric, trackAggregatedMetric} from './insights';
import {Log} from './log';
import {Seconds, defaultNow} from './types';

// Keep track of some basic statistics, reset every reporting period
export interface Statistics {
    periodStart: Seconds;

    datagrams: number;
    decodeFailures: number;
    observations: number;

    unitsPublished: number;
    subscribersDropped: number;

    // summed every housekeeping cycle so we can average
    activeSubscribers: number;
    subscriberCycles: number;
}

export function createStatistics(now: Seconds = defaultNow()): Statistics {
    return {
        periodStart: now,
        datagrams: 0,
        decodeFailures: 0,
        observations: 0,
        unitsPublished: 0,
        subscribersDropped: 0,
        activeSubscribers: 0,
        subscriberCycles: 0
    };
}

//
// Log and send the counters, then start a new period
export function reportStatistics(statistics: Statistics, log: Log, now: Seconds = defaultNow()): void {
    const period = now - statistics.periodStart;
    const averageSubscribers = statistics.subscriberCycles ? statistics.activeSubscribers / statistics.subscriberCycles : 0;

    if (period > 0) {
        log.info(
            `NMEA: ${statistics.datagrams} datagrams, ${(statistics.datagrams / period).toFixed(1)} msg/s, ${statistics.decodeFailures} undecodable, ${statistics.observations} observations, ` +
                `${statistics.unitsPublished} units sent, ${averageSubscribers.toFixed(1)} avg subscribers, ${statistics.subscribersDropped} dropped`
        );
        trackMetric('nmea.datagrams', statistics.datagrams);
        trackMetric('nmea.msgsSec', statistics.datagrams / period);
        trackMetric('nmea.decodeFailures', statistics.decodeFailures);
        trackMetric('nmea.observations', statistics.observations);
        trackMetric('subscribers.unitsSent', statistics.unitsPublished);
        trackMetric('subscribers.dropped', statistics.subscribersDropped);
        trackAggregatedMetric('subscribers.active', averageSubscribers, statistics.subscriberCycles || 1);
    }

    Object.assign(statistics, createStatistics(now));
}
