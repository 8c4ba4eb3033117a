import {MetricKey, angleRange, normaliseAngle} from './metrics';
import {Seconds} from './types';

// A key only has an entry once it has been observed, so value and
// lastUpdateTime are always present together
interface SmoothingState {
    value: number;
    lastUpdateTime: Seconds;
}

export interface SmoothingUpdate {
    status: 'initialized' | 'updated';
    value: number;
}

//
// Exponential moving average per metric, the weight of each new sample
// depends on how long it has been since the previous one:
//
//   alpha = 1 - exp(-dt/tau)
//
// so irregular sentence rates smooth the same as regular ones. tau <= 0
// disables smoothing.
//
// Angles move the short way round, 359 towards 1 passes through 0 rather
// than 180, and the result stays in the key's range
//
// Only the ingest loop should call update()
export class SmoothingStore {
    private readonly state = new Map<MetricKey, SmoothingState>();

    constructor(readonly tau: Seconds) {}

    update(key: MetricKey, rawValue: number, observedAt: Seconds): SmoothingUpdate {
        const current = this.state.get(key);

        if (!current) {
            this.state.set(key, {value: rawValue, lastUpdateTime: observedAt});
            return {status: 'initialized', value: rawValue};
        }

        if (this.tau <= 0) {
            current.value = rawValue;
        } else {
            // Clock can step backwards (wall time), treat that as no time passing
            const dt = Math.max(0, observedAt - current.lastUpdateTime);
            const alpha = 1 - Math.exp(-dt / this.tau);
            const range = angleRange(key);
            if (range) {
                const difference = normaliseAngle(rawValue - current.value, 'signed');
                current.value = normaliseAngle(current.value + alpha * difference, range);
            } else {
                current.value = current.value + alpha * (rawValue - current.value);
            }
        }
        current.lastUpdateTime = observedAt;

        return {status: 'updated', value: current.value};
    }

    snapshot(key: MetricKey): number | undefined {
        return this.state.get(key)?.value;
    }

    // Every key that has been observed
    entries(): [MetricKey, number][] {
        return Array.from(this.state, ([key, s]) => [key, s.value]);
    }
}
