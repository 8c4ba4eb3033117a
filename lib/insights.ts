import {setup, defaultClient, TelemetryClient} from 'applicationinsights';

let insightsClient: TelemetryClient | null = null;

// Only reports if a connection string has been configured
export function initialiseInsights(connectionString: string | undefined = process.env.APPLICATIONINSIGHTS_CONNECTION_STRING) {
    if (connectionString && !insightsClient) {
        setup(connectionString) //
            .setAutoCollectConsole(true)
            .setAutoCollectDependencies(false)
            .setAutoCollectExceptions(true)
            .setAutoCollectHeartbeat(true)
            .setAutoCollectPerformance(true, false)
            .setAutoCollectRequests(true)
            .setAutoDependencyCorrelation(false)
            .setUseDiskRetryCaching(true)
            .start();
        insightsClient = defaultClient;
    }
}

export function trackMetric(name: string, value: number): void {
    insightsClient?.trackMetric({name, value});
}

// value is the average over count samples
export function trackAggregatedMetric(name: string, value: number, count: number = 1): void {
    insightsClient?.trackMetric({name, value, count});
}
